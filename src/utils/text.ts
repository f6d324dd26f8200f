export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive matcher for a phrase that must stand as whole words:
 * `eth` matches "ETH Zurich" but not "Methodist".
 */
export function wholeWordPattern(phrase: string, flags = 'i'): RegExp {
  return new RegExp(`(?<!\\w)${escapeRegExp(phrase)}(?!\\w)`, flags);
}
