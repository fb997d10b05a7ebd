import type { ConversionOptions } from "./types";

/** YAML front matter at the very start of a document. */
const FRONTMATTER_REGEX = /^---\r?\n[\s\S]*?(?:\r?\n)?---(?:\r?\n|$)/;

/** Inline `![alt](src "title")` and reference `![alt][id]` images. */
const MD_IMAGE_REGEX = /!\[[^\]]*\](?:\([^)]*\)|\[[^\]]*\])/g;
const HTML_IMAGE_REGEX = /<img\b[^>]*>/gi;
const IMAGE_REF_DEFINITION_REGEX = /^\s*\[[^\]]+\]:\s*\S+\.(?:png|jpe?g|gif|bmp|svg|webp|emf|wmf|tiff?)\b.*$/gim;

const FENCE_REGEX = /^\s*(```|~~~)/;
const TABLE_SEPARATOR_REGEX = /^\s*\|?\s*:?-{2,}:?\s*(\|\s*:?-{2,}:?\s*)*\|?\s*$/;

/**
 * Canonical text form: LF line endings, no trailing whitespace, at most one
 * blank line in a row, exactly one trailing newline. Blank input stays "".
 */
export function normalizeMarkdown(markdown: string): string {
  const lines = markdown
    .replace(/\r\n?/g, "\n")
    .replace(/\u0000/g, "")
    .split("\n")
    .map((line) => line.replace(/[ \t]+$/, ""));

  const out: string[] = [];
  let inFence = false;
  for (const line of lines) {
    if (FENCE_REGEX.test(line)) inFence = !inFence;
    if (!inFence && line === "" && out[out.length - 1] === "") continue;
    out.push(line);
  }

  const text = out.join("\n").trim();
  return text ? `${text}\n` : "";
}

export function stripImages(markdown: string): string {
  return markdown
    .replace(MD_IMAGE_REGEX, "")
    .replace(HTML_IMAGE_REGEX, "")
    .replace(IMAGE_REF_DEFINITION_REGEX, "");
}

function stripInline(text: string): string {
  return text
    .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/(\*\*|__)(.+?)\1/g, "$2")
    .replace(/(^|[^*\w])\*(?!\s)([^*]+?)\*(?!\w)/g, "$1$2")
    .replace(/`([^`]+)`/g, "$1");
}

/**
 * Drops Markdown structure (headings, list markers, quotes, tables, emphasis)
 * while keeping the text. Code inside fences is kept verbatim.
 */
export function flattenMarkdown(markdown: string): string {
  const out: string[] = [];
  let inFence = false;

  for (const line of markdown.split("\n")) {
    if (FENCE_REGEX.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      out.push(line);
      continue;
    }
    if (TABLE_SEPARATOR_REGEX.test(line) && line.includes("-")) continue;
    if (/^\s*([-*_])(\s*\1){2,}\s*$/.test(line)) continue;

    let text = line
      .replace(/^\s{0,3}#{1,6}\s+/, "")
      .replace(/\s+#+\s*$/, "")
      .replace(/^\s*>\s?/, "")
      .replace(/^\s*(?:[-*+]|\d+[.)])\s+(?:\[[ xX]\]\s+)?/, "");

    if (/^\s*\|.*\|\s*$/.test(text)) {
      text = text
        .trim()
        .replace(/^\||\|$/g, "")
        .split("|")
        .map((cell) => cell.trim())
        .filter(Boolean)
        .join(" ");
    }

    out.push(stripInline(text));
  }

  return out.join("\n");
}

export interface FrontMatterFields {
  title: string;
  source: string;
  format: string;
  converter: string;
}

function yamlString(value: string): string {
  return JSON.stringify(value);
}

export function renderFrontMatter(fields: FrontMatterFields): string {
  return [
    "---",
    `title: ${yamlString(fields.title)}`,
    `source: ${yamlString(fields.source)}`,
    `format: ${yamlString(fields.format)}`,
    `converter: ${yamlString(fields.converter)}`,
    "---",
    "",
  ].join("\n");
}

/**
 * Applies the per-task options to raw capability output. The result is
 * normalized; an empty string means the document had no content.
 */
export function postProcess(
  markdown: string,
  options: ConversionOptions,
  meta: FrontMatterFields,
): string {
  const existing = FRONTMATTER_REGEX.exec(markdown);
  const ownFrontMatter = existing ? existing[0] : "";

  let body = markdown.slice(ownFrontMatter.length);
  if (!options.extractImages) body = stripImages(body);
  if (!options.preserveStructure) body = flattenMarkdown(body);
  body = normalizeMarkdown(body);
  if (!body) return "";

  // Documents that already carry front matter keep their own.
  if (ownFrontMatter) {
    return `${normalizeMarkdown(ownFrontMatter)}\n${body}`;
  }
  if (options.includeMetadata) {
    return `${renderFrontMatter(meta)}\n${body}`;
  }
  return body;
}
