/**
 * FactClassifier - Partitions content items into short facts and long-form content
 */

export interface ClassifiedContent {
  facts: string[];
  mainContent: string[];
}

export const DEFAULT_FACT_THRESHOLD = 200;

/**
 * Items shorter than `threshold` characters are facts, the rest main content.
 * Relative order is kept within each list; items are returned as given.
 */
export function classifyContent(
  items: readonly string[],
  threshold: number = DEFAULT_FACT_THRESHOLD
): ClassifiedContent {
  const facts: string[] = [];
  const mainContent: string[] = [];

  for (const item of items) {
    if (item.length < threshold) {
      facts.push(item);
    } else {
      mainContent.push(item);
    }
  }

  return { facts, mainContent };
}
