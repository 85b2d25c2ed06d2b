import crypto from "node:crypto";

// Key-sorted JSON so equal values always hash the same.
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainRecord(value)) {
    const next: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      next[key] = sortKeys(value[key]);
    }
    return next;
  }
  return value;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

// Short identifier for ledger entries and events.
export function shortHash(value: unknown, length = 16): string {
  return sha256Hex(stableStringify(value)).slice(0, length);
}
