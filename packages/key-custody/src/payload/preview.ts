export const PREVIEW_MAX_LENGTH = 500;

function insertText(op: unknown): string {
  if (typeof op === 'object' && op !== null && 'insert' in op && typeof op.insert === 'string') {
    return op.insert;
  }
  return '';
}

/**
 * Plain-text preview of a note body.
 *
 * Bodies holding a JSON array of rich-text insert operations give the concatenated
 * string inserts, trimmed and cut to 500 characters plus `...`. Any other body is
 * returned unchanged.
 */
export function previewText(content: string | null | undefined): string | null {
  if (!content) {
    return null;
  }

  let ops: unknown;
  try {
    ops = JSON.parse(content);
  } catch {
    return content;
  }
  if (!Array.isArray(ops)) {
    return content;
  }

  const text = ops.map(insertText).join('').trim();
  return text.length > PREVIEW_MAX_LENGTH ? `${text.slice(0, PREVIEW_MAX_LENGTH)}...` : text;
}
