import crypto from "crypto";

export type Seed = string | number;

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters become the numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

/**
 * Normalize a user-supplied seed to the numeric form random sources accept
 */
export function toNumericSeed(seed: Seed): number {
  return typeof seed === "string" ? hashStringToSeed(seed) : seed;
}
