/**
 * Insertion point syntax: `{{name}}`, optional inner whitespace.
 * A leading backslash (`\{{name}}`) escapes the point and emits it literally.
 */
export const INSERTION_POINT_PATTERN = /(\\)?\{\{\s*([A-Za-z_][\w-]*)\s*\}\}/g;

/**
 * Collect the insertion points of a template text in order of first appearance.
 */
export function extractInsertionPoints(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(INSERTION_POINT_PATTERN)) {
    const [, escaped, name] = match;
    if (escaped || names.includes(name)) continue;
    names.push(name);
  }
  return names;
}
