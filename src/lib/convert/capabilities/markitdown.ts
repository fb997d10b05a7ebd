import * as fs from "node:fs/promises";
import { MarkItDown } from "markitdown-ts";
import { errorMessage } from "../../errors";
import { detectFormat } from "../detect";
import { handlesExtension } from "../registry";
import { type Capability, type ParseResult, parsed, parseFailure } from "../types";

const MARKITDOWN_EXTENSIONS = [
  ".docx",
  ".pdf",
  ".xlsx",
  ".xls",
  ".pptx",
  ".html",
  ".htm",
  ".csv",
  ".json",
  ".xml",
  ".ipynb",
  ".zip",
];

let markitdown: MarkItDown | null = null;

function getMarkItDown(): MarkItDown {
  if (!markitdown) markitdown = new MarkItDown();
  return markitdown;
}

/**
 * Generic Office/PDF decoder. Works on an in-memory buffer so sniffed files
 * without an extension are handled the same way.
 */
export const markitdownCapability: Capability = {
  name: "markitdown",
  extensions: MARKITDOWN_EXTENSIONS,
  canHandle: handlesExtension(MARKITDOWN_EXTENSIONS),

  async parse(filePath): Promise<ParseResult> {
    const { ext } = detectFormat(filePath);
    try {
      const buffer = await fs.readFile(filePath);
      const result = await getMarkItDown().convertBuffer(buffer, {
        file_extension: ext,
      });

      if (!result) {
        return parseFailure(`Conversion failed for ${filePath}: no result returned`);
      }

      return parsed({
        markdown: result.text_content,
        title: result.title ?? undefined,
        format: ext.slice(1),
      });
    } catch (err) {
      return parseFailure(`markitdown failed for ${filePath}: ${errorMessage(err)}`, err);
    }
  },
};
