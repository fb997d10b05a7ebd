import * as fs from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { createDefaultRegistry } from "../src/lib/convert/capabilities";
import { detectFormat, sniffHead } from "../src/lib/convert/detect";
import { CapabilityRegistry } from "../src/lib/convert/registry";
import { fakeCapability, tempDir, testSettings } from "./helpers";

describe("CapabilityRegistry", () => {
  it("returns candidates in registration order", () => {
    const registry = new CapabilityRegistry()
      .register(fakeCapability("first", [".docx"], "a"))
      .register(fakeCapability("other", [".pdf"], "b"))
      .register(fakeCapability("fallback", [".docx", ".pdf"], "c"));

    expect(registry.candidates("/docs/report.docx").map((c) => c.name)).toEqual(["first", "fallback"]);
    expect(registry.candidates("/docs/report.pdf").map((c) => c.name)).toEqual(["other", "fallback"]);
    expect(registry.resolve("/docs/report.docx")?.name).toBe("first");
  });

  it("matches extensions case-insensitively", () => {
    const registry = new CapabilityRegistry().register(fakeCapability("word", [".docx"], "x"));
    expect(registry.resolve("/docs/REPORT.DOCX")?.name).toBe("word");
  });

  it("resolves nothing for unknown extensions", () => {
    const registry = new CapabilityRegistry().register(fakeCapability("word", [".docx"], "x"));
    expect(registry.resolve("/docs/image.xyz")).toBeUndefined();
    expect(registry.candidates("/docs/image.xyz")).toEqual([]);
  });

  it("reports the union of supported extensions", () => {
    const registry = new CapabilityRegistry()
      .register(fakeCapability("a", [".docx", ".pdf"], "x"))
      .register(fakeCapability("b", [".pdf", ".html"], "y"));

    expect([...registry.supportedFormats()].sort()).toEqual([".docx", ".html", ".pdf"]);
    expect(registry.describe()).toEqual([
      { name: "a", extensions: [".docx", ".pdf"] },
      { name: "b", extensions: [".pdf", ".html"] },
    ]);
    expect(registry.size).toBe(2);
  });

  it("builds the default chain with pandoc last", () => {
    const registry = createDefaultRegistry(testSettings());
    expect(registry.describe().map((c) => c.name)).toEqual([
      "plaintext",
      "mammoth",
      "turndown",
      "markitdown",
      "pandoc",
    ]);
    expect(registry.resolve("/docs/notes.txt")?.name).toBe("plaintext");
    expect(registry.resolve("/docs/report.docx")?.name).toBe("mammoth");
    expect(registry.resolve("/docs/page.html")?.name).toBe("turndown");
  });
});

describe("format detection", () => {
  it("recognises common signatures", () => {
    expect(sniffHead(Buffer.from("PK\x03\x04rest", "latin1"))).toBe(".docx");
    expect(sniffHead(Buffer.from("%PDF-1.7"))).toBe(".pdf");
    expect(sniffHead(Buffer.from("<!DOCTYPE html>"))).toBe(".html");
    expect(sniffHead(Buffer.from("<html><b"))).toBe(".html");
    expect(sniffHead(Buffer.from("From: someone"))).toBe(".eml");
    expect(sniffHead(Buffer.from("plain words"))).toBe(".md");
  });

  it("trusts the extension when there is one", () => {
    const dir = tempDir();
    const file = path.join(dir, "report.PDF");
    fs.writeFileSync(file, "<html></html>");
    expect(detectFormat(file)).toEqual({ ext: ".pdf", sniffed: false });
  });

  it("sniffs files without an extension", () => {
    const dir = tempDir();
    const html = path.join(dir, "page");
    const empty = path.join(dir, "empty");
    fs.writeFileSync(html, "<!doctype html><p>hi</p>");
    fs.writeFileSync(empty, "");

    expect(detectFormat(html)).toEqual({ ext: ".html", sniffed: true });
    expect(detectFormat(empty)).toEqual({ ext: "", sniffed: false });
    expect(detectFormat(path.join(dir, "missing"))).toEqual({ ext: "", sniffed: false });
  });
});
