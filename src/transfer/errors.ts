export class SourceNotFoundError extends Error {
  readonly source: string;
  readonly code = "ENOENT";

  constructor(source: string) {
    super(`Source does not exist: ${source}`);
    this.name = "SourceNotFoundError";
    this.source = source;
  }
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
