import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { DestinationState, TransferOptions, TransferOutcome, TransferRequest } from "./types.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { copyViaStaging } from "./copy.js";
import { decideDuplicate } from "./duplicates.js";
import { describeError, errorCode, isNotFound, SourceNotFoundError } from "./errors.js";

const log = createSubsystemLogger("transfer");

export const DEFAULT_TRANSFER_OPTIONS: TransferOptions = {
  forceOverwrite: false,
  safeCopy: false,
  dryRun: false,
  verify: "size",
  hashAlgo: "sha256",
};

async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
}

function isSameEntry(src: string, srcStat: Stats, dst: string, dstStat: Stats | null): boolean {
  if (src === dst) {
    return true;
  }
  return dstStat !== null && dstStat.dev === srcStat.dev && dstStat.ino === srcStat.ino;
}

/**
 * Move `request.source` to `request.destination` without ever leaving a
 * half-written file under the destination name.
 *
 * - Missing source: throws {@link SourceNotFoundError}; nothing is touched.
 * - Same file on both sides, or an existing destination the duplicate policy
 *   keeps: `ok: false`, nothing is touched.
 * - Dry run: reports the action that would be taken, nothing is touched.
 * - Otherwise a rename, or (safe-copy mode and cross-device moves) a copy
 *   through `<destination>.partial~` followed by removal of the source.
 */
export async function safeMove(
  request: TransferRequest,
  options: TransferOptions = DEFAULT_TRANSFER_OPTIONS,
): Promise<TransferOutcome> {
  const startTime = Date.now();
  const src = path.resolve(request.source);
  const dst = path.resolve(request.destination);
  const { onProgress } = options;

  const finish = (outcome: TransferOutcome): TransferOutcome => {
    const level = outcome.action === "failed" ? "error" : outcome.ok ? "info" : "warn";
    log[level]({ src, dst, ...outcome }, "transfer %s", outcome.action);
    onProgress?.({ type: "transfer.done", outcome, elapsed_ms: Date.now() - startTime });
    return outcome;
  };

  const failed = (bytes: number, err: unknown): TransferOutcome =>
    finish({
      ok: false,
      action: "failed",
      source_state: "retained",
      destination_state: "unchanged",
      dry_run: options.dryRun,
      bytes,
      error: describeError(err),
    });

  let srcStat: Stats | null;
  try {
    srcStat = await statOrNull(src);
  } catch (err) {
    return failed(0, err);
  }
  if (!srcStat) {
    throw new SourceNotFoundError(request.source);
  }
  const bytes = srcStat.size;

  let dstStat: Stats | null;
  try {
    dstStat = await statOrNull(dst);
  } catch (err) {
    return failed(bytes, err);
  }

  const rejected = (action: "rejected_self" | "rejected_duplicate"): TransferOutcome =>
    finish({
      ok: false,
      action,
      source_state: "retained",
      destination_state: "unchanged",
      dry_run: options.dryRun,
      bytes,
    });

  if (isSameEntry(src, srcStat, dst, dstStat)) {
    return rejected("rejected_self");
  }

  if (dstStat) {
    const decision = decideDuplicate({
      sourceBytes: bytes,
      destinationBytes: dstStat.size,
      forceOverwrite: options.forceOverwrite,
      allowUpgrade: request.allow_upgrade ?? false,
    });
    if (decision === "keep") {
      return rejected("rejected_duplicate");
    }
    log.info(
      { src, dst, sourceBytes: bytes, destinationBytes: dstStat.size },
      "replacing existing destination",
    );
  }

  const written: DestinationState = dstStat ? "replaced" : "created";

  if (options.dryRun) {
    return finish({
      ok: true,
      action: options.safeCopy ? "staged_copy" : "direct_move",
      source_state: "retained",
      destination_state: "unchanged",
      dry_run: true,
      bytes,
    });
  }

  onProgress?.({ type: "transfer.start", source: src, destination: dst, bytes });

  if (!options.safeCopy) {
    try {
      await fs.mkdir(path.dirname(dst), { recursive: true });
      // rename() replaces an existing destination atomically.
      await fs.rename(src, dst);
      return finish({
        ok: true,
        action: "direct_move",
        source_state: "removed",
        destination_state: written,
        dry_run: false,
        bytes,
      });
    } catch (err) {
      if (errorCode(err) !== "EXDEV") {
        return failed(bytes, err);
      }
      log.info({ src, dst }, "cross-device move, falling back to staged copy");
    }
  }

  const copied = await copyViaStaging({
    src,
    dst,
    hashAlgo: options.hashAlgo,
    verify: options.verify,
    onChunk: onProgress
      ? (bytesCopied) =>
          onProgress({
            type: "transfer.copy.progress",
            destination: dst,
            bytes_copied: bytesCopied,
            total_bytes: bytes,
          })
      : undefined,
  });
  if (copied.status === "error") {
    return failed(bytes, copied.error);
  }

  const hash = copied.hash || undefined;
  try {
    await fs.unlink(src);
  } catch (err) {
    return finish({
      ok: false,
      action: "staged_copy",
      source_state: "retained",
      destination_state: written,
      dry_run: false,
      bytes,
      hash,
      error: `copied, but could not remove source: ${describeError(err)}`,
    });
  }

  return finish({
    ok: true,
    action: "staged_copy",
    source_state: "removed",
    destination_state: written,
    dry_run: false,
    bytes,
    hash,
  });
}
