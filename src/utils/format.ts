/**
 * Number formatting for report cells
 */

/**
 * Format a number to a fixed count of significant digits, dropping
 * trailing zeros: 0.25 -> "0.25", 1/3 -> "0.33333", 4 -> "4"
 */
export function formatSignificant(value: number, digits: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(digits)));
}

/**
 * Display width of text in code points, so astral characters count once
 */
export function textWidth(text: string): number {
  return [...text].length;
}

/**
 * Left-align text in a cell of the given width; longer text is kept whole
 */
export function padCell(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - textWidth(text)));
}
