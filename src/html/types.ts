/// # html options
///
/// knobs for the two halves of html generation. the defaults are what the
/// cli uses.

import type { BundledTheme } from "shiki";
import type { Logger } from "../types.js";

export interface HighlighterOptions {
  /// any bundled shiki theme. defaults to `github-light`, which the page
  /// styles are drawn to match.
  theme?: BundledTheme;
  /// where grammar-loading trouble gets reported. defaults to `console`.
  logger?: Pick<Logger, "warn">;
}

export interface DocumentOptions {
  /// page title. defaults to the display name of the first file.
  title?: string;
  /// emit a table of contents. only takes effect with more than one file.
  toc?: boolean;
  /// token rules from the highlighter, appended to the page styles.
  tokenCss?: string;
}
