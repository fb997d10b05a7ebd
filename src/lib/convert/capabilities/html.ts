import * as fs from "node:fs/promises";
import TurndownService from "turndown";
import { errorMessage } from "../../errors";
import { handlesExtension } from "../registry";
import { type Capability, type ParseResult, parsed, parseFailure } from "../types";

const HTML_EXTENSIONS = [".html", ".htm"];

const TITLE_REGEX = /<title[^>]*>([\s\S]*?)<\/title>/i;

/**
 * Turndown configured for CommonMark-style output. Shared by every
 * capability that goes through HTML.
 */
export function createTurndown(): TurndownService {
  const turndown = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
    emDelimiter: "_",
  });
  turndown.remove(["script", "style", "noscript", "head"]);
  return turndown;
}

export function extractHtmlTitle(html: string): string | undefined {
  const match = TITLE_REGEX.exec(html);
  const title = match?.[1]?.replace(/\s+/g, " ").trim();
  return title || undefined;
}

export function htmlToMarkdown(html: string): string {
  return createTurndown().turndown(html);
}

export const htmlCapability: Capability = {
  name: "turndown",
  extensions: HTML_EXTENSIONS,
  canHandle: handlesExtension(HTML_EXTENSIONS),

  async parse(filePath): Promise<ParseResult> {
    try {
      const html = await fs.readFile(filePath, "utf-8");
      return parsed({
        markdown: htmlToMarkdown(html),
        title: extractHtmlTitle(html),
        format: "html",
      });
    } catch (err) {
      return parseFailure(`turndown failed for ${filePath}: ${errorMessage(err)}`, err);
    }
  },
};
