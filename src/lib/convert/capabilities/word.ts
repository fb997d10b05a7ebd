import mammoth from "mammoth";
import { errorMessage } from "../../errors";
import { createLogger } from "../../utils/logger";
import { handlesExtension } from "../registry";
import { type Capability, type ParseResult, parsed, parseFailure } from "../types";
import { htmlToMarkdown } from "./html";

const log = createLogger("mammoth");

const WORD_EXTENSIONS = [".docx"];

function firstHeading(markdown: string): string | undefined {
  const match = /^#{1,2}\s+(.+)$/m.exec(markdown);
  return match?.[1]?.trim() || undefined;
}

/**
 * Word documents through mammoth's semantic HTML, then turndown. Images are
 * inlined as data URIs; the pipeline drops them when extraction is off.
 */
export const wordCapability: Capability = {
  name: "mammoth",
  extensions: WORD_EXTENSIONS,
  canHandle: handlesExtension(WORD_EXTENSIONS),

  async parse(filePath): Promise<ParseResult> {
    try {
      const result = await mammoth.convertToHtml({ path: filePath });
      for (const message of result.messages) {
        log.debug(`${filePath}: ${message.type}: ${message.message}`);
      }
      const markdown = htmlToMarkdown(result.value);
      return parsed({ markdown, title: firstHeading(markdown), format: "docx" });
    } catch (err) {
      return parseFailure(`mammoth failed for ${filePath}: ${errorMessage(err)}`, err);
    }
  },
};
