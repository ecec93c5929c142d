/// # errors
///
/// every failure the tool knows about has a class here. the `code` field is
/// what callers switch on; the message is what the user reads.
///
/// `UnreadableFile` is the only one the pipeline recovers from: the file is
/// skipped with a warning and the run carries on. the rest end the run.

export type ErrorCode = "InputNotFound" | "NoFilesMatched" | "UnreadableFile" | "OutputWriteFailure";

export interface CodeprintErrorOptions {
  cause?: unknown;
}

export class CodeprintError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: CodeprintErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = options.cause;
  }
}

export class InputNotFoundError extends CodeprintError {
  constructor(readonly path: string) {
    super("InputNotFound", `'${path}' not found`);
  }
}

/// `allUnreadable` is for the case where files were selected but every one
/// of them was skipped while reading.
export class NoFilesMatchedError extends CodeprintError {
  constructor(readonly root: string, { allUnreadable = false }: { allUnreadable?: boolean } = {}) {
    super(
      "NoFilesMatched",
      allUnreadable ? `every selected file in '${root}' was unreadable` : `no source files found in '${root}'`
    );
  }
}

export class UnreadableFileError extends CodeprintError {
  constructor(readonly path: string, readonly reason: string, options: CodeprintErrorOptions = {}) {
    super("UnreadableFile", `cannot read '${path}': ${reason}`, options);
  }
}

export class OutputWriteError extends CodeprintError {
  constructor(readonly path: string, options: CodeprintErrorOptions = {}) {
    super("OutputWriteFailure", `cannot write '${path}'${describeCause(options.cause)}`, options);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `: ${cause.message}` : "";
}
