/// # codeprint
///
/// source code in, one self-contained, syntax-highlighted html page out.
/// files are picked by `select.ts`, colored by shiki behind the `Highlighter`
/// interface, and stitched together by `generateDocument`. `convert` runs the
/// whole thing; the cli is a wrapper around it.

export { convert, defaultOutputPath, type ConvertDeps, type ConvertOptions, type ConvertResult } from "./convert.js";
export { createExclusionRules, isExcluded, readSourceFile, selectFiles, IGNORED_DIRECTORIES, type SelectOptions } from "./select.js";
export { effectiveExtension, isSourceFile, resolveLanguage, PLAIN_TEXT } from "./languages.js";
export {
  createHighlighter,
  createPlainHighlighter,
  generateDocument,
  escapeHtml,
  sectionId,
  DEFAULT_THEME,
  type DocumentOptions,
  type Highlighter,
  type HighlighterOptions
} from "./html.js";
export { openInBrowser, openCommandFor, type Opener } from "./open.js";
export {
  CodeprintError,
  InputNotFoundError,
  NoFilesMatchedError,
  OutputWriteError,
  UnreadableFileError,
  type ErrorCode
} from "./errors.js";
export type { ExclusionRules, HighlightedFragment, Logger, OutputDocument, SkippedFile, SourceFile } from "./types.js";
