/**
 * Pulls a JSON value out of model output.
 *
 * Models wrap JSON in prose or markdown fences often enough that a plain
 * `JSON.parse` is not sufficient. Three strategies run in order:
 * 1. the whole trimmed text
 * 2. each fenced block (```json or bare ```)
 * 3. the first balanced `{...}` or `[...]` span
 */

export type ExtractMethod = 'direct' | 'fence' | 'search';

export type JsonExtractResult =
  | { success: true; data: unknown; method: ExtractMethod }
  | { success: false; error: string };

export function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

function fencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  const fence = /```(?:json)?\s*\n?([\s\S]*?)\n?```/g;
  let match: RegExpExecArray | null;
  while ((match = fence.exec(text)) !== null) {
    const body = (match[1] ?? '').trim();
    if (body) blocks.push(body);
  }
  return blocks;
}

/**
 * Returns the first balanced object or array span, honoring string escapes,
 * or null when there is none.
 */
export function findBalancedSpan(text: string): string | null {
  const starts = [text.indexOf('{'), text.indexOf('[')].filter((index) => index !== -1);
  if (starts.length === 0) return null;

  const start = Math.min(...starts);
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (escaped) {
      escaped = false;
    } else if (inString) {
      if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
    } else if (char === '"') {
      inString = true;
    } else if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Extracts the first parseable JSON value from free text.
 */
export function extractJson(text: string): JsonExtractResult {
  const trimmed = text.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return { success: true, data: direct.value, method: 'direct' };

  for (const block of fencedBlocks(trimmed)) {
    const parsed = tryParse(block);
    if (parsed.ok) return { success: true, data: parsed.value, method: 'fence' };
  }

  const span = findBalancedSpan(trimmed);
  if (span === null) {
    return { success: false, error: 'No JSON object or array found in model output' };
  }
  const searched = tryParse(span);
  if (searched.ok) return { success: true, data: searched.value, method: 'search' };
  return { success: false, error: `Found JSON-like span but parse failed: ${searched.message}` };
}
