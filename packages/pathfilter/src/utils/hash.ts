import { createHash } from "node:crypto";

function encodeNumber(value: number): unknown {
  if (Object.is(value, -0)) return { $number: "-0" };
  return Number.isFinite(value) ? value : { $number: String(value) };
}

/**
 * JSON replacer that sorts object keys and encodes values JSON has no
 * form for, so equal structures serialize identically and distinct ones
 * never do. Dates are read from the holder because `JSON.stringify` has
 * already replaced them with their `toJSON()` string.
 */
function canonicalReplacer(
  this: unknown,
  key: string,
  value: unknown,
): unknown {
  const raw =
    typeof this === "object" && this !== null ? Reflect.get(this, key) : value;
  if (raw instanceof Date) {
    const time = raw.getTime();
    return { $date: Number.isNaN(time) ? "Invalid Date" : raw.toISOString() };
  }
  if (typeof value === "number") {
    return encodeNumber(value);
  }
  if (typeof value === "bigint") {
    return { $bigint: value.toString() };
  }
  if (value === undefined) {
    return { $undefined: true };
  }
  if (value instanceof Map) {
    return { $map: [...value.entries()] };
  }
  if (value instanceof Set) {
    return { $set: [...value.values()] };
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = Reflect.get(value, key);
    }
    return sorted;
  }
  return value;
}

/**
 * Deterministic serialization of a structure built from JSON values,
 * bigints, Maps, Sets and Dates.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, canonicalReplacer);
}

/**
 * First 8 hex characters of the SHA-256 digest of the canonical form.
 */
export function structuralHash(value: unknown): string {
  return createHash("sha256")
    .update(canonicalJson(value), "utf8")
    .digest("hex")
    .slice(0, 8);
}
