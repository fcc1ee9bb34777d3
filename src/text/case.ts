/**
 * True when the string has at least one cased letter and none in lowercase.
 */
export function isUpperCase(value: string): boolean {
  return value.toUpperCase() === value && value.toLowerCase() !== value;
}

export function capitalizeFirst(value: string): string {
  const [first, ...rest] = Array.from(value);
  if (first === undefined) return value;
  return first.toUpperCase() + rest.join("");
}

function startsUpperCase(value: string): boolean {
  const [first] = Array.from(value);
  return first !== undefined && isUpperCase(first);
}

/**
 * Give `replacement` the casing pattern of `original`:
 * all caps, first letter only, or as written.
 */
export function adaptCase(original: string, replacement: string): string {
  if (isUpperCase(original)) {
    return replacement.toUpperCase();
  }
  if (startsUpperCase(original)) {
    return capitalizeFirst(replacement);
  }
  return replacement;
}
