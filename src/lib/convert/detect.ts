import * as fs from "node:fs";
import * as path from "node:path";
import { SNIFF_BYTES } from "../../config";
import type { DetectedFormat } from "./types";

const SIGNATURES: Array<{ test: (head: string) => boolean; ext: string }> = [
  { test: (head) => head.startsWith("PK\x03\x04"), ext: ".docx" },
  { test: (head) => head.startsWith("%PDF"), ext: ".pdf" },
  {
    test: (head) => {
      const lowered = head.toLowerCase();
      return lowered.startsWith("<!doctyp") || lowered.startsWith("<html");
    },
    ext: ".html",
  },
  {
    test: (head) => head.startsWith("From:") || head.startsWith("Return-P"),
    ext: ".eml",
  },
];

/**
 * Maps the first bytes of a file to an extension. Anything unrecognised is
 * treated as plain Markdown text.
 */
export function sniffHead(head: Buffer): string {
  const text = head.toString("latin1");
  for (const sig of SIGNATURES) {
    if (sig.test(text)) return sig.ext;
  }
  return ".md";
}

function readHead(filePath: string): Buffer | null {
  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, "r");
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const read = fs.readSync(fd, buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, read);
  } catch {
    return null;
  } finally {
    if (fd !== undefined) fs.closeSync(fd);
  }
}

/**
 * Extension-first detection. Only files without an extension are sniffed;
 * an unknown extension stays as it is so nothing claims it by accident.
 */
export function detectFormat(filePath: string): DetectedFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext) return { ext, sniffed: false };

  const head = readHead(filePath);
  if (!head || head.length === 0) return { ext: "", sniffed: false };
  return { ext: sniffHead(head), sniffed: true };
}
