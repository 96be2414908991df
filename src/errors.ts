export type ErrorCode = "ENOTE" | "EPARSE" | "EWRITE" | "EACCESS" | "EENRICH";

export class CalnotesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A note file is missing at the path the caller asked for. */
export class NotFoundError extends CalnotesError {
  readonly filePath: string;

  constructor(filePath: string) {
    super("ENOTE", `Note not found: ${filePath}`);
    this.filePath = filePath;
  }
}

/** A note header or calendar feed could not be parsed. */
export class ParseError extends CalnotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EPARSE", message, options);
  }
}

/** A write left the target untouched; `cause` holds the filesystem error. */
export class WriteFailure extends CalnotesError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super("EWRITE", `Could not write ${filePath}: ${describeError(cause)}`, { cause });
    this.filePath = filePath;
  }
}

export class AccessDeniedError extends CalnotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EACCESS", message, options);
  }
}

export class EnrichmentFailure extends CalnotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EENRICH", message, options);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isErrnoException(error) && codes.includes(error.code ?? "");
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
