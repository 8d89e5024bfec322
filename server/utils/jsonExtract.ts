import JSON5 from 'json5';

/**
 * JSON extraction for model answers that wrap the payload in prose or code
 * fences, or stop before closing it.
 */

export const stripCodeFence = (value: string): string =>
  value.replace(/^```(?:json|json5|text)?\s*\r?\n?/, '').replace(/```[\s\r\n]*$/, '').trim();

const closerFor = (opener: string): string => (opener === '{' ? '}' : ']');

/**
 * First balanced `{...}` or `[...]` in the string. A truncated payload is
 * auto-closed from the stack of unmatched openers.
 */
export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  let start = -1;
  let end = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (char === '\\') {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      if (stack.length === 0) start = i;
      stack.push(char);
    } else if ((char === '}' || char === ']') && stack.length > 0) {
      // A mismatched closer still pops so a stray bracket cannot wedge the scan.
      stack.pop();
      if (stack.length === 0) {
        end = i;
        break;
      }
    }
  }

  if (start === -1) {
    return null;
  }

  let candidate = end !== -1 ? trimmed.slice(start, end + 1) : trimmed.slice(start);
  if (end === -1) {
    if (inString) {
      candidate = `${escapeNext ? candidate.slice(0, -1) : candidate}"`;
    }
    candidate += stack.slice().reverse().map(closerFor).join('');
  }
  return candidate.trim();
};

export const extractJson = (rawResponse: string): string | null => extractBalancedJson(stripCodeFence(rawResponse));

/**
 * Parses a list of short strings out of a model answer. Accepts a bare array or
 * an object carrying the array under `topics`; anything else yields null.
 */
export const parseStringList = (rawResponse: string): string[] | null => {
  const extracted = extractJson(rawResponse);
  if (!extracted) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(extracted);
  } catch {
    return null;
  }
  const list =
    Array.isArray(parsed) ? parsed : typeof parsed === 'object' && parsed !== null && 'topics' in parsed ? parsed.topics : null;
  if (!Array.isArray(list)) {
    return null;
  }
  const items = list
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : null;
};
