import logger from './logger.js';

const MAX_REPAIR_INPUT = 50_000;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/** Close any braces/brackets left open by a truncated completion. */
function closeTruncated(text: string): string {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (escaped) { escaped = false; continue; }
    if (ch === '\\' && inString) { escaped = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') closers.push('}');
    else if (ch === '[') closers.push(']');
    else if (ch === '}' || ch === ']') closers.pop();
  }
  const body = inString ? `${text}"` : text;
  return body.replace(/,\s*$/, '') + closers.reverse().join('');
}

/**
 * Recover a JSON value from model output that may be wrapped in markdown
 * fences, surrounded by prose, carry trailing commas or be cut off.
 * Returns undefined when nothing parseable is found.
 */
export function repairJSON(text: string): unknown {
  if (!text) return undefined;

  let cleaned = text
    .replace(/^\s*```(?:json)?\s*\n?/i, '')
    .replace(/\n?```\s*$/i, '')
    .trim();

  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const start = cleaned.search(/[{[]/);
  if (start >= 0) {
    const closeChar = cleaned[start] === '{' ? '}' : ']';
    const end = cleaned.lastIndexOf(closeChar);
    cleaned = end > start ? cleaned.slice(start, end + 1) : cleaned.slice(start);
    const extracted = tryParse(cleaned);
    if (extracted !== undefined) return extracted;
  }

  const noTrailingCommas = cleaned.replace(/,\s*([\]}])/g, '$1');
  const withoutCommas = tryParse(noTrailingCommas);
  if (withoutCommas !== undefined) return withoutCommas;

  if (noTrailingCommas.length > MAX_REPAIR_INPUT) {
    logger.warn({ size: noTrailingCommas.length }, 'Skipping aggressive JSON repair on large input');
    return undefined;
  }

  const quotedKeys = noTrailingCommas.replace(/([{,]\s*)([A-Za-z_$][\w$]*)\s*:/g, '$1"$2":');
  const keysFixed = tryParse(quotedKeys);
  if (keysFixed !== undefined) return keysFixed;

  const closed = tryParse(closeTruncated(quotedKeys));
  if (closed !== undefined) return closed;

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
