import { describe, expect, it } from "vitest";
import { effectiveExtension, extensionOf, isSourceFile, PLAIN_TEXT, resolveLanguage } from "../src/languages.js";

describe("resolveLanguage", () => {
  it("maps extensions to shiki language ids", () => {
    expect(resolveLanguage("test.cc")).toBe("cpp");
    expect(resolveLanguage("src/app.tsx")).toBe("tsx");
    expect(resolveLanguage("deploy.sh")).toBe("shellscript");
    expect(resolveLanguage("config.yml")).toBe("yaml");
  });

  it("ignores the case of the extension", () => {
    expect(resolveLanguage("MAIN.PY")).toBe("python");
  });

  it("recognises extensionless files by name", () => {
    expect(resolveLanguage("Makefile")).toBe("make");
    expect(resolveLanguage("/repo/Dockerfile")).toBe("docker");
    expect(resolveLanguage("CMakeLists.txt")).toBe("cmake");
  });

  it("falls back to plain text", () => {
    expect(resolveLanguage("data.unknownext")).toBe(PLAIN_TEXT);
    expect(resolveLanguage("LICENSE")).toBe(PLAIN_TEXT);
    expect(resolveLanguage("constructor")).toBe(PLAIN_TEXT);
    expect(resolveLanguage("x.toString")).toBe(PLAIN_TEXT);
  });
});

describe("isSourceFile", () => {
  it("accepts known extensions and names", () => {
    expect(isSourceFile("a.go")).toBe(true);
    expect(isSourceFile("Gemfile")).toBe(true);
    expect(isSourceFile("notes.txt")).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isSourceFile("photo.jpeg")).toBe(false);
    expect(isSourceFile("README")).toBe(false);
    expect(isSourceFile("hasOwnProperty")).toBe(false);
  });
});

describe("extensionOf", () => {
  it("returns the last extension, lower-cased, without the dot", () => {
    expect(extensionOf("a.tar.GZ")).toBe("gz");
    expect(extensionOf("Makefile")).toBe("");
    expect(extensionOf(".bashrc")).toBe("");
  });
});

describe("effectiveExtension", () => {
  it("answers with the name for extensionless files the table knows", () => {
    expect(effectiveExtension("/repo/Makefile")).toBe("makefile");
    expect(effectiveExtension("Rakefile")).toBe("rakefile");
  });

  it("otherwise answers with the extension", () => {
    expect(effectiveExtension("CMakeLists.txt")).toBe("txt");
    expect(effectiveExtension("a.H")).toBe("h");
    expect(effectiveExtension("LICENSE")).toBe("");
  });
});
