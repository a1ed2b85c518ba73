/**
 * JSON wire form of domain values.
 *
 * Domain state carries bigint amounts, which JSON cannot hold. Responses
 * pass through toWire(), which writes every bigint as its decimal string.
 */

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

export function toWire(value: unknown): WireValue {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toWire(item));
  }
  if (typeof value === "object") {
    const out: Record<string, WireValue> = {};
    const entries: [string, unknown][] = Object.entries(value);
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        out[key] = toWire(entry);
      }
    }
    return out;
  }
  return null;
}
