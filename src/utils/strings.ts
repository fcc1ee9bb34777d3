export function truncateMiddle(text: string | undefined | null, limit: number): string {
  if (!text || text.length <= limit) return text ?? "";

  const startLength = Math.floor(limit * 0.6);
  const endLength = limit - startLength - 5;

  const start = text.slice(0, startLength);
  const end = text.slice(-endLength);
  return `${start} ... ${end}`;
}

export function flattenWhitespace(text: string | undefined | null): string {
  return text ? text.replaceAll(/\s+/g, " ").trim() : "";
}

export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: a.length + 1 }, (_, index) => index);
  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        (previous[j - 1] ?? 0) + cost,
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1
      );
    }
    previous = current;
  }
  return previous[a.length] ?? 0;
}
