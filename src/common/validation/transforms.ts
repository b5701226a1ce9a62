/**
 * Normalises a query-string id list. Accepts `ids=a,b`, repeated
 * `ids=a&ids=b`, or a mix of both.
 */
export function toIdList(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : [value];
  return raw
    .filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
    .flatMap((v) => String(v).split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}
