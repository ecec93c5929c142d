/// # html generation (re-export)
///
/// the implementation lives in `./html/index.ts`; this keeps the public
/// import path short.

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
} from "./html/index.js";
