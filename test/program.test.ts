import { afterEach, describe, expect, it, vi } from "vitest";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { createPlainHighlighter } from "../src/html.js";
import { run } from "../src/program.js";
import { attr, findAll, makeTree, parseStrict, removeTree, textContent } from "./helpers.js";

const roots: string[] = [];

function tree(files: Record<string, string>): string {
  const root = makeTree(files);
  roots.push(root);
  return root;
}

function deps() {
  return {
    logger: { log: vi.fn(), warn: vi.fn(), error: vi.fn() },
    opener: vi.fn(async () => {}),
    highlighter: createPlainHighlighter()
  };
}

function headers(path: string): string[] {
  const { document } = parseStrict(readFileSync(path, "utf-8"));
  return findAll(document, element => attr(element, "class") === "file-header").map(textContent);
}

afterEach(() => {
  for (const root of roots.splice(0)) removeTree(root);
});

describe("run", () => {
  it("converts a directory with repeated and comma-separated filters", async () => {
    const root = tree({
      "a.cpp": "",
      "a_test.cpp": "",
      "a_mock.cpp": "",
      "b.h": "",
      "c.hpp": "",
      "d.py": ""
    });
    const d = deps();

    const code = await run(
      ["node", "codeprint", root, "--not-match-f", "test", "--not-match-f", "mock", "--exclude-ext", "h,.HPP"],
      d
    );

    expect(code).toBe(0);
    expect(headers(join(root, "bundle.html"))).toEqual(["a.cpp", "d.py"]);
    expect(d.opener).not.toHaveBeenCalled();
  });

  it("accepts -o and --open", async () => {
    const root = tree({ "main.go": "package main\n" });
    const output = join(root, "page.html");
    const d = deps();

    const code = await run(["node", "codeprint", join(root, "main.go"), "-o", output, "--open"], d);

    expect(code).toBe(0);
    expect(existsSync(output)).toBe(true);
    expect(d.opener).toHaveBeenCalledWith(output);
  });

  it("exits non-zero for a missing path", async () => {
    const root = tree({});
    const d = deps();

    const code = await run(["node", "codeprint", join(root, "missing")], d);

    expect(code).toBe(1);
    expect(d.logger.error).toHaveBeenCalledWith(`✗ Error: '${join(root, "missing")}' not found`);
    expect(d.logger.error).toHaveBeenCalledTimes(1);
  });

  it("exits non-zero for an empty directory and writes nothing", async () => {
    const root = tree({});
    const d = deps();

    const code = await run(["node", "codeprint", root], d);

    expect(code).toBe(1);
    expect(d.logger.error).toHaveBeenCalledWith(`✗ Error: no source files found in '${root}'`);
    expect(existsSync(join(root, "bundle.html"))).toBe(false);
  });

  it("prints the stack trace with --verbose", async () => {
    const root = tree({});
    const d = deps();

    await run(["node", "codeprint", root, "--verbose"], d);

    expect(d.logger.error).toHaveBeenCalledTimes(2);
    expect(d.logger.error.mock.calls[1]?.[0]).toMatch(/^\n\w*Error: no source files found/);
  });

  it("leaves usage errors to commander", async () => {
    const d = deps();
    const writeErr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const code = await run(["node", "codeprint"], d);

    writeErr.mockRestore();
    expect(code).toBe(1);
    expect(d.logger.error).not.toHaveBeenCalled();
  });
});
