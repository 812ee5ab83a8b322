import stringWidth from 'string-width';

/**
 * Escape blessed tag delimiters in user-controlled text (stash messages, diffs).
 */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (c) => (c === '{' ? '{open}' : '{close}'));
}

/**
 * Display width of plain (untagged) text.
 */
export function textWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Calculate visible length by stripping blessed tags. The {open} and {close}
 * escapes each render as one brace.
 */
export function visibleLength(content: string): number {
  return stringWidth(content.replace(/\{(open|close)\}/g, '_').replace(/\{[^}]+\}/g, ''));
}

/**
 * Truncate to a display width (wide characters count double), ending in '…'.
 */
export function truncateToWidth(text: string, maxWidth: number, suffix: string = '…'): string {
  if (maxWidth <= 0) return '';
  if (stringWidth(text) <= maxWidth) return text;

  const budget = maxWidth - stringWidth(suffix);
  let result = '';
  let width = 0;
  for (const char of text) {
    const w = stringWidth(char);
    if (width + w > budget) break;
    result += char;
    width += w;
  }
  return result + suffix;
}

/**
 * Truncate then pad with spaces to exactly `width` columns.
 */
export function fitToWidth(text: string, width: number): string {
  const truncated = truncateToWidth(text, width);
  return truncated + ' '.repeat(Math.max(0, width - stringWidth(truncated)));
}
