import { errorMessage } from "../internals/exceptions";
import { isErrnoException } from "../vfs/virtualFileSystem";

/**
 * Categories of failures reported by the operation layer.
 */
export type FsErrorKind =
  | "PathNotFound"
  | "PermissionDenied"
  | "NotEmptyDirectory"
  | "UnsupportedOperation"
  | "FileSystemError";

export type OperationName =
  | "validate"
  | "fileInfo"
  | "list"
  | "copy"
  | "move"
  | "deleteFile"
  | "createDirectory"
  | "deleteDirectory"
  | "rename"
  | "changeExtension"
  | "bulkChangeExtensions"
  | "createEmpty"
  | "size"
  | "clean";

/**
 * Where a failure happened.
 */
export interface ErrorContext {
  operation: OperationName;
  /** Paths involved in the operation, sources first. */
  paths: string[];
}

/**
 * A failure of a single operation.
 */
export class FsError extends Error {
  constructor(
    public readonly kind: FsErrorKind,
    message: string,
    public readonly context: ErrorContext,
    /** The errno code of the host failure, if any. */
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = kind;
  }

  /**
   * Wraps a host failure.
   * @param summary Describes the attempted operation, e.g. "Could not copy a to b".
   */
  static from(err: unknown, summary: string, context: ErrorContext): FsError {
    if (err instanceof FsError) {
      return err;
    }
    const code = isErrnoException(err) ? err.code : undefined;
    const reason = errorMessage(err);
    return new FsError(
      classifyErrorCode(code),
      `${summary}: ${reason}`,
      context,
      code,
      { cause: err },
    );
  }

  toJSON(): {
    kind: FsErrorKind;
    message: string;
    code?: string;
    context: ErrorContext;
  } {
    return {
      kind: this.kind,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Maps a host errno code to an error kind.
 */
export function classifyErrorCode(code: string | undefined): FsErrorKind {
  switch (code) {
    case "ENOENT":
      return "PathNotFound";
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return "PermissionDenied";
    case "ENOTEMPTY":
      return "NotEmptyDirectory";
    default:
      return "FileSystemError";
  }
}

export type OpOk<T> = {
  kind: "ok";
  value: T;
};

export type OpError = {
  kind: "error";
  error: FsError;
};

/**
 * Outcome of an operation.
 */
export type OpResult<T> = OpOk<T> | OpError;

export const ok = <T>(value: T): OpOk<T> => ({ kind: "ok", value });

export const fail = (error: FsError): OpError => ({ kind: "error", error });
