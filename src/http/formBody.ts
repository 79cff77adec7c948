// src/http/formBody.ts
export type FormFields = Record<string, string>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function parseDeclaredLength(declared: string | number | undefined): number | null {
  if (typeof declared === 'number') {
    return Number.isSafeInteger(declared) && declared >= 0 ? declared : null;
  }
  if (typeof declared !== 'string') return null;
  const trimmed = declared.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const length = Number(trimmed);
  return Number.isSafeInteger(length) ? length : null;
}

/**
 * Decodes an `application/x-www-form-urlencoded` body into single-valued fields.
 *
 * Never throws. A missing or malformed declared length, a missing body, or bytes that
 * are not UTF-8 all yield `{}`. The first value wins for repeated keys and pairs with
 * an empty value are dropped.
 */
export function parseFormBody(
  body: Uint8Array | string | null | undefined,
  declaredLength: string | number | undefined,
): FormFields {
  const length = parseDeclaredLength(declaredLength);
  if (length === null || body == null) return {};

  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;

  let text: string;
  try {
    text = utf8.decode(bytes.subarray(0, length));
  } catch {
    return {};
  }

  const fields = new Map<string, string>();
  for (const [key, value] of new URLSearchParams(text)) {
    if (value === '' || fields.has(key)) continue;
    fields.set(key, value);
  }
  return Object.fromEntries(fields);
}
