/**
 * Decoding helpers for LLM replies
 * Replies are expected to hold one JSON object or array, possibly wrapped in
 * thinking tokens or markdown code fences. Decoding never throws: a reply
 * that does not match the target shape yields the caller's fallback.
 */

/**
 * Narrowing function for a decoded JSON value. Returns the value in its target
 * shape, or null when the value does not fit.
 */
export type JsonShape<T> = (value: unknown) => T | null;

/**
 * Clean response text - removes thinking tokens and code fence markers
 */
export function cleanResponse(response: string): string {
  let clean = response;

  // Remove <think>...</think> blocks
  clean = clean.replace(/<think>[\s\S]*?<\/think>/gi, '');

  // Handle unclosed <think> tags - take everything after it
  const thinkStart = clean.indexOf('<think>');
  if (thinkStart !== -1) {
    clean = clean.substring(thinkStart + 7);
  }

  clean = clean.trim();
  clean = clean.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/i, '');

  return clean.trim();
}

/**
 * Extract balanced JSON from text - handles nested braces/brackets correctly
 * Supports both objects {...} and arrays [...]
 */
export function extractBalancedJSON(text: string): string | null {
  const objStart = text.indexOf('{');
  const arrStart = text.indexOf('[');

  let start: number;
  if (arrStart !== -1 && (objStart === -1 || arrStart < objStart)) {
    start = arrStart;
  } else if (objStart !== -1) {
    start = objStart;
  } else {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === '\\' && inString) {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === '{' || char === '[') depth++;
    else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) {
        return text.substring(start, i + 1);
      }
    }
  }

  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse an LLM reply into a JSON value: the cleaned reply first, then the
 * first balanced JSON fragment inside it.
 */
export function parseJsonReply(response: string): unknown {
  const cleaned = cleanResponse(response);
  const direct = tryParse(cleaned);
  if (direct.ok) {
    return direct.value;
  }
  const fragment = extractBalancedJSON(cleaned);
  if (fragment !== null) {
    const nested = tryParse(fragment);
    if (nested.ok) {
      return nested.value;
    }
  }
  return undefined;
}

/**
 * Decode a reply into the target shape, or null when it does not fit
 */
export function decodeJsonReply<T>(response: string, shape: JsonShape<T>): T | null {
  const value = parseJsonReply(response);
  return value === undefined ? null : shape(value);
}

// ============================================
// Shape helpers
// ============================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Keep the string entries of an array; anything else becomes []
 */
export function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * A JSON array whose entries are all strings
 */
export const stringArrayShape: JsonShape<string[]> = (value) => {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.every((item): item is string => typeof item === 'string') ? value : null;
};
