import fs from "node:fs/promises";
import type { HashAlgo } from "./types.js";
import { hashFile } from "./hash-transform.js";

/**
 * Check a staged copy before it is renamed into place: its size must match
 * the source and, when `expectedHash` is given, so must its digest.
 * Throws on mismatch.
 */
export async function verifyStagedCopy(opts: {
  partial: string;
  expectedBytes: number;
  expectedHash?: string;
  hashAlgo: HashAlgo;
}): Promise<void> {
  const { partial, expectedBytes, expectedHash, hashAlgo } = opts;

  const stat = await fs.stat(partial);
  if (stat.size !== expectedBytes) {
    throw new Error(`verify failed: ${partial} is ${stat.size} bytes, expected ${expectedBytes}`);
  }

  if (expectedHash !== undefined) {
    const actual = await hashFile(partial, hashAlgo);
    if (actual !== expectedHash) {
      throw new Error(`verify failed: ${hashAlgo} mismatch for ${partial}`);
    }
  }
}
