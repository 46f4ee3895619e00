/**
 * True unless one of the ignore words appears in the title. Matching is a
 * case-insensitive substring test, so "wip" also catches "WIP-123".
 */
export function isAllowedTitle(title: string, ignoreWords: readonly string[]): boolean {
  const normalizedTitle = title.toLowerCase();
  return !ignoreWords.some((word) => normalizedTitle.includes(word.toLowerCase()));
}

/** The ignore words that matched, for logging */
export function matchedIgnoreWords(title: string, ignoreWords: readonly string[]): string[] {
  const normalizedTitle = title.toLowerCase();
  return ignoreWords.filter((word) => normalizedTitle.includes(word.toLowerCase()));
}
