/**
 * Compare character lists produced by the part-of-speech pipeline with the
 * ones extracted by a model
 */

export interface NameSetComparison {
  traditionalOnly: string[];
  llmOnly: string[];
  common: string[];
  traditionalCount: number;
  llmCount: number;
  /** Size of the intersection over the size of the union, as a percentage */
  overlapPercentage: number;
}

export function compareWithTraditional(
  traditionalNames: readonly string[],
  llmNames: readonly string[]
): NameSetComparison {
  const traditional = new Set(traditionalNames);
  const llm = new Set(llmNames);
  const union = new Set([...traditional, ...llm]);

  const sorted = (names: Iterable<string>): string[] => [...names].sort();
  const common = sorted([...traditional].filter((name) => llm.has(name)));

  return {
    traditionalOnly: sorted([...traditional].filter((name) => !llm.has(name))),
    llmOnly: sorted([...llm].filter((name) => !traditional.has(name))),
    common,
    traditionalCount: traditional.size,
    llmCount: llm.size,
    overlapPercentage: union.size === 0 ? 0 : (common.length / union.size) * 100,
  };
}

/**
 * Every name and alias of the extracted characters, for comparison against a
 * pipeline that does not merge aliases
 */
export function surfaceForms(characters: ReadonlyArray<{ name: string; aliases: string[] }>): string[] {
  return [...new Set(characters.flatMap((c) => [c.name, ...c.aliases]))].sort();
}
