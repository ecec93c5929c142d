/// # html generation
///
/// the assembler. it takes fragments the highlighter already rendered and
/// puts them in one page: a single `<head>` with every style the page
/// needs, then one `<section>` per file, in the order given.
///
/// fragments are trusted. they were escaped once, token by token, when they
/// were rendered, and escaping them again here would turn every `&lt;` in
/// the code into a visible `&amp;lt;`. what *isn't* trusted is everything
/// the assembler adds itself: titles and file names go through `escapeHtml`.

import type { HighlightedFragment } from "../types.js";
import { defaultCss } from "./styles.js";
import { escapeHtml } from "./tokens.js";
import type { DocumentOptions } from "./types.js";

export type { DocumentOptions, HighlighterOptions } from "./types.js";
export { createHighlighter, createPlainHighlighter, DEFAULT_THEME, type Highlighter } from "./highlight.js";
export { escapeHtml } from "./tokens.js";

/// section ids are positional, `file-0`, `file-1`, ..., and the highlighter
/// is told the same prefix for its line anchors, so `#file-3-L40` is line 40
/// of the fourth file.
export function sectionId(index: number): string {
  return `file-${index}`;
}

export function generateDocument(fragments: readonly HighlightedFragment[], options: DocumentOptions = {}): string {
  const title = options.title ?? fragments[0]?.file.displayName ?? "";
  const toc = options.toc && fragments.length > 1 ? renderToc(fragments) : "";
  const sections = fragments.map((fragment, index) => renderSection(fragment, index)).join("\n");
  return wrapHtml(`${toc}${sections}`, title, options.tokenCss ?? "");
}

function renderToc(fragments: readonly HighlightedFragment[]): string {
  const items = fragments
    .map((fragment, index) => `    <li><a href="#${sectionId(index)}">${escapeHtml(fragment.file.displayName)}</a></li>`)
    .join("\n");

  return `<nav class="toc">
  <h2>Table of Contents</h2>
  <ul>
${items}
  </ul>
</nav>
`;
}

function renderSection(fragment: HighlightedFragment, index: number): string {
  return `<section class="file-section" id="${sectionId(index)}">
  <h2 class="file-header">${escapeHtml(fragment.file.displayName)}</h2>
${fragment.html}
</section>`;
}

function wrapHtml(body: string, title: string, tokenCss: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${defaultCss}
${tokenCss}
  </style>
</head>
<body>
${body}
</body>
</html>
`;
}
