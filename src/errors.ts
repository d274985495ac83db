export type ErrorCode = "MALFORMED_MANIFEST" | "INVALID_MANIFEST" | "MISSING_ROOT";

export class DepweightError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DepweightError";
    this.code = code;
  }
}

/** A package.json that exists but cannot be used to identify its package. */
export class ManifestError extends DepweightError {
  readonly manifestPath: string;

  constructor(
    code: "MALFORMED_MANIFEST" | "INVALID_MANIFEST",
    manifestPath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(code, `${manifestPath}: ${detail}`, options);
    this.name = "ManifestError";
    this.manifestPath = manifestPath;
  }
}

export class UsageError extends DepweightError {
  constructor(message: string) {
    super("MISSING_ROOT", message);
    this.name = "UsageError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  return toError(error).message;
}

/** Node system errors carry a string `code` such as ENOENT. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
