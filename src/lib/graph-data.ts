/**
 * Node/link view of an analysis, in the shape D3.js force layouts expect
 */

import type { Character, CharacterRole, Relationship } from '../types/index.js';

export interface GraphNode {
  id: string;
  role: CharacterRole;
  confidence: number;
}

export interface GraphLink {
  source: string;
  target: string;
  relationship: string;
  weight: number;
}

export interface GraphData {
  nodes: GraphNode[];
  links: GraphLink[];
}

/**
 * Nodes for every character; links only between known characters
 */
export function buildGraphData(
  characters: readonly Character[],
  relationships: readonly Relationship[]
): GraphData {
  const nodes = characters.map((c) => ({ id: c.name, role: c.role, confidence: c.confidence }));
  const ids = new Set(nodes.map((node) => node.id));
  const links = relationships
    .filter((r) => ids.has(r.character1) && ids.has(r.character2))
    .map((r) => ({
      source: r.character1,
      target: r.character2,
      relationship: r.type,
      weight: r.strength / 10,
    }));
  return { nodes, links };
}
