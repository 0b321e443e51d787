/**
 * Typed error catalog shared by the library and the CLI.
 *
 * Every failure surfaced by treetool is a TreeToolError subclass with a
 * stable errorCode and the process exit code the CLI terminates with
 * (sysexits.h numbering).
 */

export type TreeToolErrorCode =
  | "USAGE"
  | "INVALID_FORMAT"
  | "NOT_FOUND"
  | "NOT_A_DIRECTORY"
  | "NOT_A_FILE"
  | "IO_ERROR"
  | "CONFIG_ERROR";

export class TreeToolError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly errorCode: TreeToolErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 64 — command line usage

export class UsageError extends TreeToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(64, "USAGE", message, details);
  }
}

// 65 — malformed input data

export class InvalidFormatError extends TreeToolError {
  constructor(
    public readonly line: number,
    reason: string,
  ) {
    super(65, "INVALID_FORMAT", `invalid index format: ${reason} on line ${line}`, {
      line,
    });
  }
}

// 66 — input paths

export class NotFoundError extends TreeToolError {
  constructor(public readonly path: string) {
    super(66, "NOT_FOUND", `no such file or directory: ${path}`, { path });
  }
}

export class NotADirectoryError extends TreeToolError {
  constructor(public readonly path: string) {
    super(66, "NOT_A_DIRECTORY", `not a directory: ${path}`, { path });
  }
}

export class NotAFileError extends TreeToolError {
  constructor(public readonly path: string) {
    super(66, "NOT_A_FILE", `not a regular file: ${path}`, { path });
  }
}

// 74 — filesystem failures

export class IoError extends TreeToolError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      74,
      "IO_ERROR",
      `i/o error on ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      {
        path,
        ...(isErrnoException(cause) && cause.code !== undefined && { code: cause.code }),
      },
      { cause },
    );
  }
}

// 78 — configuration

export class ConfigError extends TreeToolError {
  constructor(
    public readonly configPath: string,
    reason: string,
    details?: Record<string, unknown>,
  ) {
    super(78, "CONFIG_ERROR", `invalid config ${configPath}: ${reason}`, {
      configPath,
      ...details,
    });
  }
}

/** Errors `buildIndex` rejects with. */
export type IndexError = NotFoundError | NotADirectoryError | IoError;

export function isTreeToolError(err: unknown): err is TreeToolError {
  return err instanceof TreeToolError;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Converts anything thrown by a filesystem call on `path` into an IoError.
 * TreeToolErrors pass through untouched.
 */
export function toIoError(err: unknown, path: string): TreeToolError {
  if (isTreeToolError(err)) {
    return err;
  }
  return new IoError(path, err);
}
