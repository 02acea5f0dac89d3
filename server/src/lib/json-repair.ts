import logger from './logger.js';

const FENCE_START = /^```(?:json)?\s*\n?/i;
const FENCE_END = /\n?```\s*$/i;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Cut the outermost object or array out of surrounding prose. */
function sliceOutermost(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return null;

  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

/** Append the closers a truncated response never got to. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Recover a JSON value from model output that may carry markdown fences,
 * surrounding prose, trailing commas or a truncated tail. Returns null when
 * nothing parseable is left; shape validation is the caller's job.
 */
export function repairJSON(text: string): unknown {
  if (!text.trim()) return null;

  const cleaned = text.replace(FENCE_START, '').replace(FENCE_END, '').trim();
  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  const sliced = sliceOutermost(cleaned);
  if (sliced === null) {
    logger.warn({ rawSnippet: text.substring(0, 300) }, 'No JSON found in model output');
    return null;
  }

  const candidates = [
    sliced,
    sliced.replace(/,\s*([\]}])/g, '$1'),
    closePartial(sliced.replace(/,\s*([\]}])/g, '$1')),
  ];
  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
