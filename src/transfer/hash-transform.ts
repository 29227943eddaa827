import crypto from "node:crypto";
import { createReadStream } from "node:fs";
import { Transform, type TransformCallback, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { HashAlgo } from "./types.js";

type Hasher = {
  update(buf: Buffer | Uint8Array): void;
  digestHex(): string;
};

export function createHasher(algo: HashAlgo): Hasher {
  const hash = crypto.createHash(algo);
  return {
    update(buf) {
      hash.update(buf);
    },
    digestHex() {
      return hash.digest("hex");
    },
  };
}

/**
 * Transform stream that passes data through unchanged while computing a hash
 * and counting bytes.
 */
export class HashTransform extends Transform {
  private readonly hasher: Hasher;
  private digest: string | null = null;
  bytes = 0;

  constructor(
    algo: HashAlgo,
    private readonly onChunk?: (bytesSoFar: number) => void,
  ) {
    super();
    this.hasher = createHasher(algo);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hasher.update(chunk);
    this.bytes += chunk.length;
    try {
      this.onChunk?.(this.bytes);
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, chunk);
  }

  /** Hex digest of everything that passed through. Call after the pipeline completes. */
  digestHex(): string {
    this.digest ??= this.hasher.digestHex();
    return this.digest;
  }
}

/** Digest of a file on disk, used to check a staged copy after it is written. */
export async function hashFile(filePath: string, algo: HashAlgo): Promise<string> {
  const ht = new HashTransform(algo);
  const discard = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    },
  });
  await pipeline(createReadStream(filePath), ht, discard);
  return ht.digestHex();
}
