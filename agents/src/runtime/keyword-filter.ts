/**
 * OR over case-insensitive substrings of title and description.
 * An empty filter keeps everything.
 */
export function matchesKeywordFilter(
  record: { title: string; description?: string },
  keywords: readonly string[],
): boolean {
  if (keywords.length === 0) return true;
  const haystack = `${record.title} ${record.description ?? ''}`.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}
