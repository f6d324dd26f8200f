/**
 * Lenient JSON extraction for model output: strips markdown fences and any
 * prose before the first bracket or after the last one.
 */
export function parseJsonResponse(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const body = fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;

  const direct = tryParse(body);
  if (direct !== undefined) return direct;

  const start = firstIndexOf(body, ['{', '[']);
  const end = Math.max(body.lastIndexOf('}'), body.lastIndexOf(']'));
  if (start === -1 || end <= start) return null;

  return tryParse(body.slice(start, end + 1)) ?? null;
}

function tryParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function firstIndexOf(text: string, chars: string[]): number {
  const positions = chars.map((c) => text.indexOf(c)).filter((i) => i >= 0);
  return positions.length > 0 ? Math.min(...positions) : -1;
}

/**
 * Pull a list out of a response that is either a bare array or an object
 * wrapping the array under `key`.
 */
export function extractList(value: unknown, key: string): unknown[] {
  if (Array.isArray(value)) return value;
  if (value !== null && typeof value === 'object' && key in value) {
    const inner: unknown = Reflect.get(value, key);
    if (Array.isArray(inner)) return inner;
  }
  return [];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
