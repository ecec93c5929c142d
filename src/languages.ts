/// # language resolution
///
/// which files count as source code, and which grammar highlights them. both
/// questions are answered from one table in `data/languages.json`: a map from
/// extension to shiki language id, and a map from whole (lower-cased) file
/// names for the extensionless classics like `Makefile`.

import { readFileSync } from "fs";
import { basename, extname } from "path";
import { z } from "zod";

const languageTableSchema = z.object({
  extensions: z.record(z.string()),
  filenames: z.record(z.string())
});

export type LanguageTable = z.infer<typeof languageTableSchema>;

/// the fallback when nothing matches. shiki treats `text` as a special
/// language that needs no grammar.
export const PLAIN_TEXT = "text";

let table: LanguageTable | null = null;

/// the table sits beside `src/` and `dist/` alike, so one relative url
/// finds it from either.
export function loadLanguageTable(): LanguageTable {
  if (table) return table;
  const raw = readFileSync(new URL("../data/languages.json", import.meta.url), "utf-8");
  table = languageTableSchema.parse(JSON.parse(raw));
  return table;
}

/// lower-cased extension without the dot. `foo.CPP` → `cpp`, `Makefile` → `""`.
export function extensionOf(filename: string): string {
  return extname(filename).slice(1).toLowerCase();
}

/// names like `constructor` would otherwise hit `Object.prototype`.
function lookup(record: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function resolveLanguage(filename: string): string {
  const { extensions, filenames } = loadLanguageTable();
  const name = basename(filename).toLowerCase();
  return lookup(filenames, name) ?? lookup(extensions, extensionOf(name)) ?? PLAIN_TEXT;
}

/// what `--exclude-ext` compares against. an extensionless file the table
/// knows by name (`Makefile`, `Dockerfile`, ...) answers to that name, so
/// `--exclude-ext makefile` drops it.
export function effectiveExtension(filename: string): string {
  const name = basename(filename).toLowerCase();
  const ext = extensionOf(name);
  if (ext !== "") return ext;
  return lookup(loadLanguageTable().filenames, name) !== undefined ? name : "";
}

export function isSourceFile(filename: string): boolean {
  const { extensions, filenames } = loadLanguageTable();
  const name = basename(filename).toLowerCase();
  return lookup(filenames, name) !== undefined || lookup(extensions, effectiveExtension(name)) !== undefined;
}
