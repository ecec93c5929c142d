/// # shared types
///
/// the data that flows through one run. nothing here outlives the run, and
/// nothing is written by more than one stage.

/// a file that has been read and decoded. `displayName` is what the reader
/// sees in headings and the table of contents: the path relative to the
/// directory being bundled, or just the file name in single-file mode.
export interface SourceFile {
  readonly path: string;
  readonly displayName: string;
  readonly content: string;
  /// shiki language id, or `text` when nothing matched.
  readonly language: string;
}

export interface HighlightedFragment {
  readonly file: SourceFile;
  /// already escaped and safe to embed as-is.
  readonly html: string;
}

export interface ExclusionRules {
  /// a file whose name contains any of these is dropped.
  readonly nameSubstrings: ReadonlySet<string>;
  /// lower-cased, no leading dot.
  readonly extensions: ReadonlySet<string>;
}

export interface OutputDocument {
  readonly html: string;
  readonly outputPath: string;
}

export interface SkippedFile {
  readonly path: string;
  readonly reason: string;
}

export type Logger = Pick<Console, "log" | "warn">;
