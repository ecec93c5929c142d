import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { parse, type DefaultTreeAdapterMap } from "parse5";

type Node = DefaultTreeAdapterMap["node"];
type Element = DefaultTreeAdapterMap["element"];

/// a throwaway directory tree. keys are relative paths, values are contents.
export function makeTree(files: Record<string, string | Uint8Array>): string {
  const root = mkdtempSync(join(tmpdir(), "codeprint-"));
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
  return root;
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function parseStrict(html: string): { document: DefaultTreeAdapterMap["document"]; errors: string[] } {
  const errors: string[] = [];
  const document = parse(html, { onParseError: error => errors.push(error.code) });
  return { document, errors };
}

function isElement(node: Node): node is Element {
  return "tagName" in node;
}

function childrenOf(node: Node): Node[] {
  return "childNodes" in node ? node.childNodes : [];
}

export function findAll(node: Node, predicate: (element: Element) => boolean): Element[] {
  const found: Element[] = [];
  for (const child of childrenOf(node)) {
    if (isElement(child) && predicate(child)) found.push(child);
    found.push(...findAll(child, predicate));
  }
  return found;
}

export function attr(element: Element, name: string): string | undefined {
  return element.attrs.find(a => a.name === name)?.value;
}

export function textContent(node: Node): string {
  if (node.nodeName === "#text" && "value" in node) return node.value;
  return childrenOf(node).map(textContent).join("");
}
