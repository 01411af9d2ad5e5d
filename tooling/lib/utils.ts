/**
 * Utility functions used across the generators
 */

import { createHash } from "crypto";
import { ScalarValue } from "./types";

/**
 * Generate SHA256 hash of text
 */
export function hashText(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Normalize whitespace in a string
 */
export function normalize(key: string): string {
  return key.replace(/\s+/g, " ").trim();
}

/**
 * Sanitize identifier for use as variable/function name
 */
export function sanitizeIdentifier(raw: string): string {
  return raw
    .replace(/[^a-zA-Z0-9_]/g, "_")
    .replace(/^(\d)/, "_$1")
    .substring(0, 100);
}

/**
 * Turn a command name into a file-safe slug: "ipsec ike encryption" -> "ipsec-ike-encryption"
 */
export function slugify(name: string): string {
  return normalize(name)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isScalar(value: unknown): value is ScalarValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Stable JSON stringification for consistent output
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (isPlainObject(val)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(val).sort()) {
        sorted[k] = val[k];
      }
      return sorted;
    }
    return val;
  });
}

/**
 * Compare two scalars the way a command line sees them: `1` and `"1"` are the same token
 */
export function scalarEquals(a: ScalarValue, b: ScalarValue): boolean {
  return String(a) === String(b);
}

/**
 * Deduplicate by a derived key while preserving order (first occurrence wins)
 */
export function dedupeBy<T>(values: T[], keyOf: (value: T) => string): T[] {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = keyOf(v);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Compare dotted firmware revisions numerically ("15.02.10" vs "15.2.9")
 */
export function compareRevisions(a: string, b: string): number {
  const left = a.split(".").map((part) => parseInt(part, 10) || 0);
  const right = b.split(".").map((part) => parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}
