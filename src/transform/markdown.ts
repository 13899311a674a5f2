// Line-anchored rewrites of note Markdown for chat platforms. Whitespace
// classes are horizontal only so that no rewrite reaches across a line break.

const HEADING = /^#{1,4}[ \t](.+)$/m;
const HEADING_ALL = /^#{1,4}[ \t](.+)$/gm;
const TOP_LEVEL_BULLET = /^[-*][ \t]?/gm;
const INDENTED_BULLET = /^[ \t]+[-*][ \t]?/gm;

export const BLUE_DIAMOND = ":small_blue_diamond: ";
export const ORANGE_DIAMOND = ":small_orange_diamond: ";

/**
 * Text of the first heading (one to four `#`) in the note, trimmed.
 * Returns an empty string when the note has no heading.
 */
export function extractTitle(content: string): string {
  const match = HEADING.exec(content);
  return match ? match[1].trim() : "";
}

/**
 * Replace bullet markers with diamond emoji: blue for top-level bullets,
 * orange for indented ones (the indentation is dropped).
 */
export function bulletsToDiamonds(content: string): string {
  return content.replace(TOP_LEVEL_BULLET, BLUE_DIAMOND).replace(INDENTED_BULLET, ORANGE_DIAMOND);
}

/**
 * Turn headings of one to four `#` into bold lines. Deeper headings are
 * left as they are.
 */
export function headingsToBold(content: string): string {
  return content.replace(HEADING_ALL, (_line, text: string) => `**${text.trim()}**`);
}
