import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage } from "../../errors";
import { handlesExtension } from "../registry";
import {
  type Capability,
  type ParseResult,
  parsed,
  parseFailure,
} from "../types";

const TEXT_EXTENSIONS = [".txt", ".text", ".md", ".markdown"];
const EMAIL_EXTENSIONS = [".eml"];

interface EmailMessage {
  headers: Map<string, string>;
  body: string;
}

/** Splits an RFC 822 message into unfolded headers and the raw body. */
export function parseEmail(raw: string): EmailMessage {
  const text = raw.replace(/\r\n?/g, "\n");
  const split = text.indexOf("\n\n");
  const headerBlock = split === -1 ? text : text.slice(0, split);
  const body = split === -1 ? "" : text.slice(split + 2);

  const headers = new Map<string, string>();
  let current: string | null = null;
  for (const line of headerBlock.split("\n")) {
    if (/^[ \t]/.test(line) && current) {
      headers.set(current, `${headers.get(current) ?? ""} ${line.trim()}`);
      continue;
    }
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    current = line.slice(0, colon).trim().toLowerCase();
    headers.set(current, line.slice(colon + 1).trim());
  }
  return { headers, body };
}

function emailToMarkdown(raw: string): { markdown: string; title?: string } {
  const { headers, body } = parseEmail(raw);
  const subject = headers.get("subject");
  const lines: string[] = [];
  if (subject) lines.push(`# ${subject}`, "");
  for (const [label, key] of [
    ["From", "from"],
    ["To", "to"],
    ["Cc", "cc"],
    ["Date", "date"],
  ] as const) {
    const value = headers.get(key);
    if (value) lines.push(`- **${label}:** ${value}`);
  }
  if (lines.length > 0) lines.push("");
  lines.push(body);
  return { markdown: lines.join("\n"), title: subject };
}

/**
 * Reads text, Markdown and e-mail files directly. Always first in the chain
 * so text never goes through a heavier converter.
 */
export const plaintextCapability: Capability = {
  name: "plaintext",
  extensions: [...TEXT_EXTENSIONS, ...EMAIL_EXTENSIONS],
  canHandle: handlesExtension([...TEXT_EXTENSIONS, ...EMAIL_EXTENSIONS]),

  async parse(filePath): Promise<ParseResult> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      return parseFailure(`Cannot read ${filePath}: ${errorMessage(err)}`, err);
    }

    const ext = path.extname(filePath).toLowerCase();
    if (EMAIL_EXTENSIONS.includes(ext) || (!ext && /^(From|Return-Path):/.test(raw))) {
      const email = emailToMarkdown(raw);
      return parsed({ markdown: email.markdown, title: email.title, format: "eml" });
    }

    return parsed({ markdown: raw, format: ext ? ext.slice(1) : "md" });
  },
};
