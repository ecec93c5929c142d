/// # token rendering
///
/// the lowest level of html output. a highlighter hands us lines of tokens,
/// each with some text and maybe a color and font style; we hand back
/// `<span>`s. colors never go inline. every distinct look a theme produces
/// gets a short class name, and the rules for those classes are collected
/// into one stylesheet for the whole document.

/// the shape we need from a token. shiki's `ThemedToken` fits it, and so
/// does anything a plain-text fallback makes up.
export interface TokenLike {
  content: string;
  color?: string;
  fontStyle?: number;
}

/// bit flags, as shiki defines them. `-1` means "not set".
const ITALIC = 1;
const BOLD = 2;
const UNDERLINE = 4;
const STRIKETHROUGH = 8;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/// ## TokenPalette
///
/// hands out `tok-0`, `tok-1`, ... in order of first appearance, one per
/// distinct (color, font style) pair. the theme's default foreground with no
/// font style gets no class at all, so plain identifiers stay plain text.

export class TokenPalette {
  private readonly classes = new Map<string, string>();
  private readonly rules: string[] = [];

  constructor(private readonly defaultColor?: string) {}

  classFor(token: TokenLike): string | undefined {
    const color = token.color?.toLowerCase();
    const style = token.fontStyle !== undefined && token.fontStyle > 0 ? token.fontStyle : 0;
    const inheritsColor = color === undefined || color === this.defaultColor?.toLowerCase();

    if (inheritsColor && style === 0) return undefined;

    const key = `${inheritsColor ? "" : color}/${style}`;
    const existing = this.classes.get(key);
    if (existing) return existing;

    const className = `tok-${this.classes.size}`;
    this.classes.set(key, className);
    this.rules.push(`.code .${className} { ${declarations(inheritsColor ? undefined : color, style).join("; ")} }`);
    return className;
  }

  get css(): string {
    return this.rules.join("\n");
  }
}

function declarations(color: string | undefined, style: number): string[] {
  const decls: string[] = [];
  if (color) decls.push(`color: ${color}`);
  if (style & ITALIC) decls.push("font-style: italic");
  if (style & BOLD) decls.push("font-weight: bold");

  const lines: string[] = [];
  if (style & UNDERLINE) lines.push("underline");
  if (style & STRIKETHROUGH) lines.push("line-through");
  if (lines.length > 0) decls.push(`text-decoration: ${lines.join(" ")}`);

  return decls;
}

/// ## renderLines
///
/// one `<span class="line">` per line, joined by real newlines so the `<pre>`
/// keeps its shape. the spans carry ids like `file-2-L17` for deep links;
/// the numbers you see are drawn by a css counter and are not part of the
/// text, so copying code out of the page copies only code.

export function renderLines(lines: readonly (readonly TokenLike[])[], palette: TokenPalette | null, anchorPrefix: string, trailingNewline: boolean): string {
  const rendered = lines.map((tokens, index) => {
    let html = `<span class="line" id="${anchorPrefix}-L${index + 1}">`;
    for (const token of tokens) {
      const className = palette?.classFor(token);
      const text = escapeHtml(token.content);
      html += className ? `<span class="${className}">${text}</span>` : text;
    }
    return html + "</span>";
  });

  return `<pre class="code"><code>${rendered.join("\n")}${trailingNewline ? "\n" : ""}</code></pre>`;
}
