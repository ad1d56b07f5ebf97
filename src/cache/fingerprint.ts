/**
 * Deterministic cache keys derived from request parameters
 */

import { createHash } from "node:crypto";

type Fingerprintable = string | number | boolean | null | undefined | Fingerprintable[] | { [key: string]: Fingerprintable };

/**
 * Serialize with sorted object keys so that property order never changes the key
 */
function canonicalize(value: Fingerprintable): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalize(value[key])}`).join(",")}}`;
  }
  if (value === undefined) {
    return "null";
  }
  return JSON.stringify(value);
}

/**
 * `<namespace>:<sha256 of the canonical parameters>`
 */
export function fingerprint(namespace: string, params: { [key: string]: Fingerprintable }): string {
  const digest = createHash("sha256").update(canonicalize(params)).digest("hex");
  return `${namespace}:${digest}`;
}
