/**
 * Export extracted characters and relationships as node/link JSON for D3.js
 */

import 'dotenv/config';
import { readFile, writeFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import { isExtractionResult, isRelationshipResult } from './types/schema.js';
import { buildGraphData } from './lib/graph-data.js';

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf-8'));
}

export async function exportGraphData(
  charactersPath: string,
  relationshipsPath: string,
  outputPath: string
): Promise<void> {
  const characters = await readJson(charactersPath);
  const relationships = await readJson(relationshipsPath);
  if (!isExtractionResult(characters)) {
    throw new Error(`${charactersPath} is not a character extraction result`);
  }
  if (!isRelationshipResult(relationships)) {
    throw new Error(`${relationshipsPath} is not a relationship result`);
  }

  const graphData = buildGraphData(characters.characters, relationships.relationships);
  await writeFile(outputPath, JSON.stringify(graphData, null, 2), 'utf-8');
  console.log(`Graph data exported to '${outputPath}'.`);
}

/**
 * Main function - handle command line arguments
 */
async function main(): Promise<void> {
  const [charactersPath, relationshipsPath, outputPath = 'graph_data.json'] = process.argv.slice(2);

  if (!charactersPath || !relationshipsPath) {
    console.error(
      'Usage: node dist/export-graph-data.js <characters.json> <relationships.json> [output.json]'
    );
    process.exitCode = 1;
    return;
  }

  try {
    await exportGraphData(charactersPath, relationshipsPath, outputPath);
  } catch (error) {
    console.error('Error exporting graph data:', error);
    process.exitCode = 1;
  }
}

// Run if called directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
