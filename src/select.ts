/// # file selection
///
/// turns the path the user gave us into the ordered list of files to render.
/// a single file is taken as-is. a directory is walked recursively, and what
/// comes out is filtered twice: once by the user's exclusion rules, and once
/// by our own idea of what a source file is.

import { lstatSync, readdirSync, readFileSync, statSync } from "fs";
import { basename, join, relative, resolve, sep } from "path";
import { UnreadableFileError } from "./errors.js";
import { effectiveExtension, isSourceFile, resolveLanguage } from "./languages.js";
import type { ExclusionRules, Logger, SourceFile } from "./types.js";

/// dependency trees, virtualenvs, vcs metadata and build output. nobody wants
/// a bundle of `node_modules`.
export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set([
  "venv", ".venv", "env", ".env",
  "node_modules",
  "__pycache__", ".pytest_cache", ".mypy_cache",
  ".git", ".svn", ".hg",
  "dist", "build", ".build",
  "target",
  "vendor"
]);

/// ## exclusion rules
///
/// `--not-match-f test,spec --not-match-f mock` and `--not-match-f test
/// --not-match-f spec,mock` have to mean the same thing, so every item is
/// split on commas and trimmed before it goes into the set. extensions also
/// lose their case and any leading dots: `.H`, `h` and `..h` are all `h`.

function splitList(items: readonly string[]): string[] {
  return items.flatMap(item => item.split(",")).map(part => part.trim()).filter(part => part.length > 0);
}

export function createExclusionRules(nameSubstrings: readonly string[] = [], extensions: readonly string[] = []): ExclusionRules {
  return {
    nameSubstrings: new Set(splitList(nameSubstrings)),
    extensions: new Set(
      splitList(extensions)
        .map(ext => ext.replace(/^\.+/, "").toLowerCase())
        .filter(ext => ext.length > 0)
    )
  };
}

export function isExcluded(filename: string, rules: ExclusionRules): boolean {
  const name = basename(filename);
  for (const fragment of rules.nameSubstrings) {
    if (name.includes(fragment)) return true;
  }
  return rules.extensions.has(effectiveExtension(name));
}

/// ## selectFiles
///
/// an explicit file target skips every filter: if you name a file, you get
/// it, even when a directory scan would have passed it over.
///
/// for directories the order is the case-insensitive relative path, with the
/// exact path as a tie-breaker so that `A.c` and `a.c` still sort the same
/// way on every run.

export interface SelectOptions {
  /// absolute paths never to return. the converter puts its own output file
  /// here so a second run doesn't bundle the first run's `bundle.html`.
  ignore?: ReadonlySet<string>;
  /// told about directories and links the walk had to skip. defaults to `console`.
  logger?: Pick<Logger, "warn">;
}

export function selectFiles(root: string, rules: ExclusionRules, options: SelectOptions = {}): string[] {
  const absRoot = resolve(root);

  if (statSync(absRoot).isFile()) {
    return [absRoot];
  }

  const ignore = options.ignore ?? new Set<string>();
  const logger = options.logger ?? console;
  const files = walk(absRoot, logger).filter(file => !ignore.has(file) && isSourceFile(file) && !isExcluded(file, rules));

  return files
    .map(file => ({ file, key: relative(absRoot, file) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(entry => entry.file);
}

function compareKeys(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/// hidden entries and the ignored directories are pruned during the walk.
/// a symlink counts when it points at a regular file; linked directories are
/// not entered, so a link cycle can't keep the walk going forever. a
/// directory we can't list, or a link we can't resolve, is skipped with a
/// warning and the walk carries on.
function walk(dir: string, logger: Pick<Logger, "warn">): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (error) {
    logger.warn(`⚠ skipping directory ${dir}: ${describe(error)}`);
    return [];
  }

  const results: string[] = [];

  for (const entry of entries) {
    if (entry.startsWith(".")) continue;

    const path = join(dir, entry);
    const stat = lstatSync(path);

    if (stat.isDirectory()) {
      if (!IGNORED_DIRECTORIES.has(entry)) {
        results.push(...walk(path, logger));
      }
    } else if (stat.isFile()) {
      results.push(path);
    } else if (stat.isSymbolicLink() && isLinkToFile(path, logger)) {
      results.push(path);
    }
  }

  return results;
}

function isLinkToFile(path: string, logger: Pick<Logger, "warn">): boolean {
  try {
    return statSync(path).isFile();
  } catch (error) {
    logger.warn(`⚠ skipping link ${path}: ${describe(error)}`);
    return false;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/// ## reading
///
/// each file is read whole, in one call, and decoded as strict utf-8. two
/// kinds of file get turned away here rather than producing garbage html:
/// binaries (a NUL byte near the start, the same sniff git uses) and text in
/// some other encoding (the decoder throws on the first invalid sequence).

const BINARY_SNIFF_LENGTH = 8000;

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });

export function readSourceFile(path: string, baseDir?: string): SourceFile {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw new UnreadableFileError(path, describe(error), { cause: error });
  }

  if (bytes.subarray(0, BINARY_SNIFF_LENGTH).includes(0)) {
    throw new UnreadableFileError(path, "binary file");
  }

  let content: string;
  try {
    content = decoder.decode(bytes);
  } catch (error) {
    throw new UnreadableFileError(path, "not valid utf-8", { cause: error });
  }

  return {
    path,
    displayName: baseDir ? toDisplayName(relative(baseDir, path)) : basename(path),
    content,
    language: resolveLanguage(path)
  };
}

/// display names always use forward slashes, whatever the platform.
function toDisplayName(rel: string): string {
  return rel.split(sep).join("/");
}
