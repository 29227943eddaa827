import { createReadStream, type Stats } from "node:fs";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { HashAlgo, VerifyMode } from "./types.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { describeError, errorCode } from "./errors.js";
import { HashTransform } from "./hash-transform.js";
import { verifyStagedCopy } from "./verify.js";

const log = createSubsystemLogger("transfer.copy");

/** Files ending in this suffix are in-flight copies, never finished media. */
export const PARTIAL_SUFFIX = ".partial~";

export function stagingPath(dst: string): string {
  return `${dst}${PARTIAL_SUFFIX}`;
}

export type StagedCopyResult =
  | { status: "copied"; bytes: number; hash: string }
  | { status: "error"; bytes: number; error: string };

/**
 * Copy mode and timestamps onto the staged file. Not every filesystem
 * supports this (e.g. FAT, some network mounts), so a failure only logs.
 */
async function copyMetadata(src: Stats, partial: string): Promise<void> {
  try {
    await fs.chmod(partial, src.mode & 0o7777);
    await fs.utimes(partial, src.atime, src.mtime);
  } catch (err) {
    log.debug({ partial, err: describeError(err) }, "could not preserve file metadata");
  }
}

async function removeStaging(partial: string): Promise<void> {
  try {
    await fs.rm(partial, { force: true });
  } catch (err) {
    log.warn({ partial, err: describeError(err) }, "could not remove staging file");
  }
}

/**
 * Stream `src` into `<dst>.partial~`, verify it, then atomically rename it
 * onto `dst` (replacing whatever is there). The source is left in place.
 * On any failure the staging file this call created is removed and `dst`
 * is untouched. A staging file that already exists belongs to another
 * transfer: the copy fails and that file is left alone.
 */
export async function copyViaStaging(opts: {
  src: string;
  dst: string;
  hashAlgo: HashAlgo;
  verify: VerifyMode;
  onChunk?: (bytesSoFar: number) => void;
}): Promise<StagedCopyResult> {
  const { src, dst, hashAlgo, verify, onChunk } = opts;
  const partial = stagingPath(dst);

  let stat: Stats;
  let handle: FileHandle;
  try {
    await fs.mkdir(path.dirname(dst), { recursive: true });
    stat = await fs.stat(src);
    // Exclusive create: the staging file exists for the whole copy and is never shared.
    handle = await fs.open(partial, "wx", 0o600);
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      log.warn({ partial }, "staging file already exists, another transfer owns it");
      return {
        status: "error",
        bytes: 0,
        error: `staging file in use by another transfer: ${partial}`,
      };
    }
    return { status: "error", bytes: 0, error: describeError(err) };
  }

  try {
    const ht = new HashTransform(hashAlgo, onChunk);
    try {
      await pipeline(createReadStream(src), ht, handle.createWriteStream());
    } finally {
      await handle.close();
    }

    await copyMetadata(stat, partial);
    if (verify !== "none") {
      await verifyStagedCopy({
        partial,
        expectedBytes: stat.size,
        expectedHash: verify === "hash" ? ht.digestHex() : undefined,
        hashAlgo,
      });
    }

    // Atomic rename
    await fs.rename(partial, dst);

    return { status: "copied", bytes: stat.size, hash: verify === "hash" ? ht.digestHex() : "" };
  } catch (err) {
    await removeStaging(partial);
    return { status: "error", bytes: 0, error: describeError(err) };
  }
}
