/// # convert
///
/// the whole pipeline, start to finish, one stage after another:
///
/// 1. check the input exists and work out where the output goes
/// 2. select files (`select.ts`)
/// 3. read and highlight each one, in order, skipping the unreadable
/// 4. assemble one document (`html/index.ts`) and write it
/// 5. open it, if asked
///
/// the cli is a thin layer over this; library users can call it directly.

import { existsSync, statSync, writeFileSync } from "fs";
import { basename, join, parse, relative, resolve } from "path";
import type { BundledTheme } from "shiki";
import { InputNotFoundError, NoFilesMatchedError, OutputWriteError, UnreadableFileError } from "./errors.js";
import { createHighlighter, generateDocument, sectionId, type Highlighter } from "./html.js";
import { openInBrowser, type Opener } from "./open.js";
import { createExclusionRules, readSourceFile, selectFiles } from "./select.js";
import type { HighlightedFragment, Logger, OutputDocument, SkippedFile, SourceFile } from "./types.js";

export interface ConvertOptions {
  /// a file or a directory.
  source: string;
  /// defaults to `<source>.html` for a file, `<dir>/bundle.html` for a directory.
  output?: string;
  open?: boolean;
  /// file-name substrings to exclude. items may be comma-separated lists.
  notMatch?: readonly string[];
  /// extensions to exclude, with or without the dot. items may be comma-separated lists.
  excludeExt?: readonly string[];
  theme?: BundledTheme;
}

export interface ConvertDeps {
  logger?: Logger;
  opener?: Opener;
  /// defaults to a shiki highlighter built with `options.theme`.
  highlighter?: Highlighter;
}

export interface ConvertResult {
  outputPath: string;
  /// display names of the files that made it into the document, in order.
  files: string[];
  skipped: SkippedFile[];
  opened: boolean;
}

/// `foo.cc` → `foo.html`. when the source is itself an `.html` file that
/// would mean writing over it, so the suffix is appended instead.
export function defaultOutputPath(source: string, isFile: boolean): string {
  if (!isFile) return join(source, "bundle.html");

  const { dir, name } = parse(source);
  const replaced = join(dir, `${name}.html`);
  return replaced === source ? `${source}.html` : replaced;
}

export async function convert(options: ConvertOptions, deps: ConvertDeps = {}): Promise<ConvertResult> {
  const logger = deps.logger ?? console;
  const opener = deps.opener ?? openInBrowser;
  const source = resolve(options.source);

  if (!existsSync(source)) {
    throw new InputNotFoundError(source);
  }

  const isFile = statSync(source).isFile();
  const outputPath = options.output ? resolve(options.output) : defaultOutputPath(source, isFile);
  const rules = createExclusionRules(options.notMatch, options.excludeExt);
  const paths = selectFiles(source, rules, { ignore: new Set([outputPath]), logger });

  if (paths.length === 0) {
    throw new NoFilesMatchedError(source);
  }

  if (!isFile) {
    logger.log(`Found ${paths.length} files:`);
    for (const path of paths) {
      logger.log(`  - ${relative(source, path)}`);
    }
  }

  const highlighter = deps.highlighter ?? (await createHighlighter({ theme: options.theme, logger }));
  const fragments: HighlightedFragment[] = [];
  const skipped: SkippedFile[] = [];

  for (const path of paths) {
    let file: SourceFile;
    try {
      file = readSourceFile(path, isFile ? undefined : source);
    } catch (error) {
      if (!(error instanceof UnreadableFileError)) throw error;
      logger.warn(`⚠ skipping ${error.path}: ${error.reason}`);
      skipped.push({ path: error.path, reason: error.reason });
      continue;
    }

    const html = await highlighter.highlight(file.content, file.path, sectionId(fragments.length));
    fragments.push({ file, html });
  }

  if (fragments.length === 0) {
    throw new NoFilesMatchedError(source, { allUnreadable: true });
  }

  const document: OutputDocument = {
    outputPath,
    html: generateDocument(fragments, {
      title: isFile ? basename(source) : `${basename(source)} - Source Code`,
      toc: !isFile,
      tokenCss: highlighter.css
    })
  };

  writeDocument(document);
  logger.log(`✓ Generated: ${outputPath}`);

  let opened = false;
  if (options.open) {
    try {
      await opener(outputPath);
      opened = true;
      logger.log("✓ Opened in browser");
    } catch (error) {
      logger.warn(`⚠ could not open a browser (${error instanceof Error ? error.message : String(error)}); open ${outputPath} manually`);
    }
  }

  return { outputPath, files: fragments.map(fragment => fragment.file.displayName), skipped, opened };
}

function writeDocument({ html, outputPath }: OutputDocument): void {
  try {
    writeFileSync(outputPath, html);
  } catch (error) {
    throw new OutputWriteError(outputPath, { cause: error });
  }
}
