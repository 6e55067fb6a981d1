function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * `text.slice(0, end)` that never splits a surrogate pair; a cut landing
 * inside an astral character drops the whole character.
 */
export function sliceWhole(text: string, end: number): string {
  if (end <= 0) return "";
  if (end >= text.length) return text;
  return isHighSurrogate(text.charCodeAt(end - 1))
    ? text.slice(0, end - 1)
    : text.slice(0, end);
}

/** Cuts text to at most `max` UTF-16 units, ending in an ellipsis when cut. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${sliceWhole(text, max - 1)}…` : text;
}
