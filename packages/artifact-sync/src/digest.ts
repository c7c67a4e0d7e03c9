/**
 * SHA-1 content digests for artifact verification.
 */

import { createHash } from "node:crypto";

const SHA1_HEX = /^[0-9a-f]{40}$/;

/**
 * Computes the lowercase hex SHA-1 of a byte buffer.
 */
export function computeDigest(bytes: Uint8Array): string {
  return createHash("sha1").update(bytes).digest("hex");
}

/**
 * Lowercases a hex digest for comparison.
 */
export function normalizeDigest(digest: string): string {
  return digest.toLowerCase();
}

/**
 * Checks a byte buffer against an expected hex SHA-1.
 *
 * Comparison is case-insensitive. An expected value that is not 40 hex
 * characters never matches; this function does not throw.
 */
export function verifyDigest(bytes: Uint8Array, expected: string): boolean {
  const normalized = normalizeDigest(expected);
  return SHA1_HEX.test(normalized) && computeDigest(bytes) === normalized;
}
