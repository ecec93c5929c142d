/// # highlighting
///
/// the one place that knows about shiki. everything else talks to the
/// `Highlighter` interface: text and a file name in, an html fragment out,
/// plus the stylesheet rules for the classes that fragment uses. swapping
/// shiki for another tokenizer means writing another one of these.

import {
  bundledLanguages,
  createHighlighter as createShikiHighlighter,
  type BundledLanguage,
  type BundledTheme,
  type HighlighterGeneric
} from "shiki";
import { PLAIN_TEXT, resolveLanguage } from "../languages.js";
import type { Logger } from "../types.js";
import { renderLines, TokenPalette, type TokenLike } from "./tokens.js";
import type { HighlighterOptions } from "./types.js";

export interface Highlighter {
  /// `anchorPrefix` namespaces the per-line ids, so several fragments can
  /// share one document. defaults to `file-0`.
  highlight(code: string, filename: string, anchorPrefix?: string): Promise<string>;
  /// rules for every token class issued so far.
  readonly css: string;
}

export const DEFAULT_THEME: BundledTheme = "github-light";

/// shiki's startup (the oniguruma wasm, the theme) is paid once per theme
/// per process. grammars are loaded on demand as files need them.
const shikiByTheme = new Map<BundledTheme, Promise<HighlighterGeneric<BundledLanguage, BundledTheme>>>();

function getShiki(theme: BundledTheme): Promise<HighlighterGeneric<BundledLanguage, BundledTheme>> {
  let shiki = shikiByTheme.get(theme);
  if (!shiki) {
    shiki = createShikiHighlighter({ themes: [theme], langs: [] });
    shikiByTheme.set(theme, shiki);
    /// a failed start isn't cached; the next caller tries again.
    void shiki.catch(() => shikiByTheme.delete(theme));
  }
  return shiki;
}

function isBundledLanguage(id: string): id is BundledLanguage {
  return Object.hasOwn(bundledLanguages, id);
}

/// shared by both highlighters: line endings become `\n`, and one trailing
/// newline is taken off before tokenizing and put back after rendering, so
/// the last line of a file doesn't show up as an empty numbered line.
function splitTrailingNewline(code: string): { body: string; trailingNewline: boolean } {
  const normalized = code.replace(/\r\n?/g, "\n");
  const trailingNewline = normalized.endsWith("\n");
  return { body: trailingNewline ? normalized.slice(0, -1) : normalized, trailingNewline };
}

/// ## createHighlighter
///
/// the shiki-backed adapter. language comes from the file name; anything
/// unrecognised, or any grammar that fails to load, is rendered as plain
/// text instead of failing the run.

export async function createHighlighter(options: HighlighterOptions = {}): Promise<Highlighter> {
  const theme = options.theme ?? DEFAULT_THEME;
  const logger: Pick<Logger, "warn"> = options.logger ?? console;
  const shiki = await getShiki(theme);
  const palette = new TokenPalette(shiki.getTheme(theme).fg);
  const failed = new Set<string>();

  async function ensureLanguage(filename: string): Promise<BundledLanguage | typeof PLAIN_TEXT> {
    const lang = resolveLanguage(filename);
    if (lang === PLAIN_TEXT || failed.has(lang) || !isBundledLanguage(lang)) {
      return PLAIN_TEXT;
    }
    if (shiki.getLoadedLanguages().includes(lang)) {
      return lang;
    }
    try {
      await shiki.loadLanguage(lang);
      return lang;
    } catch (error) {
      failed.add(lang);
      logger.warn(`⚠ no ${lang} grammar (${error instanceof Error ? error.message : String(error)}), using plain text`);
      return PLAIN_TEXT;
    }
  }

  return {
    async highlight(code, filename, anchorPrefix = "file-0") {
      const { body, trailingNewline } = splitTrailingNewline(code);
      if (body === "" && !trailingNewline) {
        return renderLines([], null, anchorPrefix, false);
      }

      const lang = await ensureLanguage(filename);
      const { tokens } = shiki.codeToTokens(body, { lang, theme });
      return renderLines(tokens, palette, anchorPrefix, trailingNewline);
    },
    get css() {
      return palette.css;
    }
  };
}

/// ## createPlainHighlighter
///
/// no colors, no shiki: the same markup with every line as a single
/// uncolored token.

export function createPlainHighlighter(): Highlighter {
  return {
    async highlight(code, _filename, anchorPrefix = "file-0") {
      const { body, trailingNewline } = splitTrailingNewline(code);
      if (body === "" && !trailingNewline) {
        return renderLines([], null, anchorPrefix, false);
      }
      const lines: TokenLike[][] = body.split("\n").map(line => (line ? [{ content: line }] : []));
      return renderLines(lines, null, anchorPrefix, trailingNewline);
    },
    css: ""
  };
}
