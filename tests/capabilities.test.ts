import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { htmlCapability, PandocCapability, pandocVersion, parseEmail } from "../src/lib/convert/capabilities";
import { detectFormat } from "../src/lib/convert/detect";
import { tempDir, writeFiles } from "./helpers";

const parseOptions = { extractImages: true, mediaDir: "/out/doc_media" };

describe("htmlCapability", () => {
  it("converts HTML and picks up the title", async () => {
    const dir = tempDir();
    writeFiles(dir, {
      "page.html":
        "<html><head><title> My  Page </title><style>p{}</style></head><body><h1>Hello</h1><p>Some <em>text</em></p></body></html>",
    });

    const result = await htmlCapability.parse(path.join(dir, "page.html"), parseOptions);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.title).toBe("My Page");
    expect(result.value.format).toBe("html");
    expect(result.value.markdown).toBe("# Hello\n\nSome _text_");
  });
});

describe("PandocCapability", () => {
  const pandoc = new PandocCapability({ binary: "/nonexistent/pandoc-test", timeoutMs: 1000 });

  it("claims the formats it has readers for", () => {
    expect(pandoc.canHandle("/d/a.rst", { ext: ".rst", sniffed: false })).toBe(true);
    expect(pandoc.canHandle("/d/a.pdf", { ext: ".pdf", sniffed: false })).toBe(false);
  });

  it("builds the command line", () => {
    expect(pandoc.buildArgs("/d/a.odt", ".odt", parseOptions)).toEqual([
      "/d/a.odt",
      "--from",
      "odt",
      "--to",
      "gfm",
      "--wrap=none",
      "--extract-media=/out/doc_media",
    ]);
    expect(pandoc.buildArgs("/d/a.odt", ".odt", { ...parseOptions, extractImages: false })).toHaveLength(6);
  });

  it("fails cleanly when the binary is missing", async () => {
    const dir = tempDir();
    writeFiles(dir, { "a.rst": "Title\n=====" });

    const result = await pandoc.parse(path.join(dir, "a.rst"), parseOptions);
    expect(result).toMatchObject({ ok: false, error: { message: 'pandoc not found at "/nonexistent/pandoc-test"' } });
    await expect(pandocVersion("/nonexistent/pandoc-test")).resolves.toBeNull();
  });
});

describe("parseEmail", () => {
  it("unfolds headers and splits the body", () => {
    const { headers, body } = parseEmail("Subject: Hi\r\n there\r\nTo: b@example.com\r\n\r\nLine one\r\nLine two");
    expect(headers.get("subject")).toBe("Hi there");
    expect(headers.get("to")).toBe("b@example.com");
    expect(body).toBe("Line one\nLine two");
  });

  it("sniffs extensionless messages", () => {
    const dir = tempDir();
    writeFiles(dir, { message: "From: a@example.com\n\nbody" });
    expect(detectFormat(path.join(dir, "message"))).toEqual({ ext: ".eml", sniffed: true });
  });
});
