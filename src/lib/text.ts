/**
 * EconDigest — Text Helpers
 */

/**
 * First `max` UTF-16 units of `text`, one fewer when the cut would
 * separate a surrogate pair.
 */
export function sliceText(text: string, max: number): string {
  if (text.length <= max) return text;
  const code = text.charCodeAt(max - 1);
  const end = code >= 0xd800 && code <= 0xdbff ? max - 1 : max;
  return text.slice(0, end);
}
