const SCRIPT_PATTERN = /<script[^>]*>[\s\S]*?<\/script\s*>/gi;
const JAVASCRIPT_PATTERN = /javascript:|on\w+\s*=/gi;
const TAG_PATTERN = /<[^>]+>/g;
// An `&` that already starts one of the entities below is left alone.
const ESCAPE_PATTERN = /&(?!(?:amp|lt|gt|quot|#x27);)|[<>"']/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export type TextSanitizer = (text: string, maxLength?: number) => string;

function stripMarkup(text: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = current.replace(SCRIPT_PATTERN, '').replace(JAVASCRIPT_PATTERN, '').replace(TAG_PATTERN, '');
  } while (current !== previous);
  return current;
}

/**
 * Removes script blocks, inline handlers and tags, then escapes what is left.
 * Escaping runs last so the removal patterns still see raw markup. Sanitized
 * text passes through unchanged.
 */
export const sanitizeText: TextSanitizer = (text, maxLength) => {
  let cleaned = stripMarkup(String(text))
    .replace(ESCAPE_PATTERN, (ch) => HTML_ESCAPES[ch] ?? ch)
    .trim();

  if (maxLength !== undefined && cleaned.length > maxLength) {
    // Never end on half an entity.
    cleaned = cleaned.slice(0, maxLength).replace(/&[#\w]*$/, '').trimEnd();
  }
  return cleaned;
};
