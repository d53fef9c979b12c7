/**
 * Lenient JSON object extraction for LLM replies
 *
 * Models wrap JSON in markdown fences, add prose around it, or leave raw
 * newlines inside strings. Tried in order:
 *
 * 1. Direct JSON.parse
 * 2. Strip code fences and cut the first balanced {...} block
 * 3. Drop trailing commas
 * 4. Escape raw newlines inside string values
 */

/**
 * Index of the brace closing the object opened at `start`, or -1
 */
export function findMatchingBrace(str: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < str.length; i++) {
    const c = str[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (c === '\\') {
      escape = true;
      continue;
    }

    if (c === '"') {
      inString = !inString;
      continue;
    }

    if (!inString) {
      if (c === '{') depth++;
      if (c === '}') {
        depth--;
        if (depth === 0) return i;
      }
    }
  }

  return -1;
}

function escapeNewlinesInStrings(json: string): string {
  let result = '';
  let inString = false;
  let escape = false;

  for (const c of json) {
    if (escape) {
      result += c;
      escape = false;
      continue;
    }
    if (c === '\\') {
      result += c;
      escape = true;
      continue;
    }
    if (c === '"') {
      inString = !inString;
    } else if (inString && c === '\n') {
      result += '\\n';
      continue;
    } else if (inString && c === '\r') {
      continue;
    }
    result += c;
  }

  return result;
}

function isJsonObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse the JSON object contained in `text`, or return undefined when none parses
 */
export function extractJsonObject(text: string): unknown {
  const direct = tryParse(text.trim());
  if (direct.ok && isJsonObject(direct.value)) return direct.value;

  const unfenced = text
    .replace(/```json\s*/gi, '')
    .replace(/```\s*/g, '')
    .trim();

  const start = unfenced.indexOf('{');
  if (start === -1) return undefined;
  const end = findMatchingBrace(unfenced, start);
  if (end === -1) return undefined;

  let candidate = unfenced.substring(start, end + 1);
  const sliced = tryParse(candidate);
  if (sliced.ok) return sliced.value;

  candidate = candidate.replace(/,\s*}/g, '}').replace(/,\s*]/g, ']');
  const withoutCommas = tryParse(candidate);
  if (withoutCommas.ok) return withoutCommas.value;

  const withEscapes = tryParse(escapeNewlinesInStrings(candidate));
  return withEscapes.ok ? withEscapes.value : undefined;
}
