import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CapabilityRegistry } from "../convert/registry";
import { walk } from "../utils/walker";
import type { SkippedFile } from "./types";

export interface DiscoveredFile {
  sourcePath: string;
  relativePath: string;
  sizeBytes: number;
}

export interface Discovery {
  /** Files that will be dispatched to converters. */
  eligible: DiscoveredFile[];
  /** Above the size ceiling; never dispatched. */
  tooLarge: SkippedFile[];
  /** No registered capability resolves them; recorded as failures. */
  unsupported: DiscoveredFile[];
}

export interface DiscoveryOptions {
  registry: CapabilityRegistry;
  maxFileSizeMb: number;
  extensions?: string[];
  excludeDirs?: string[];
  respectIgnoreFiles?: boolean;
}

function normalizeExtension(ext: string): string {
  const lowered = ext.trim().toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

/**
 * Walks `inputDir` and classifies each file: size first, then whether any
 * capability can take it. Results are in path order.
 */
export async function discoverFiles(inputDir: string, options: DiscoveryOptions): Promise<Discovery> {
  const root = path.resolve(inputDir);
  const maxBytes = options.maxFileSizeMb * 1024 * 1024;
  const allow = options.extensions ? new Set(options.extensions.map(normalizeExtension)) : null;

  const discovery: Discovery = { eligible: [], tooLarge: [], unsupported: [] };
  const relPaths: string[] = [];
  for await (const rel of walk(root, {
    excludeDirs: options.excludeDirs,
    respectIgnoreFiles: options.respectIgnoreFiles,
  })) {
    if (allow && !allow.has(path.extname(rel).toLowerCase())) continue;
    relPaths.push(rel);
  }
  relPaths.sort();

  for (const relativePath of relPaths) {
    const sourcePath = path.join(root, relativePath);
    let sizeBytes: number;
    try {
      sizeBytes = (await fs.stat(sourcePath)).size;
    } catch {
      // Vanished since the walk; the pipeline reports it as missing.
      sizeBytes = 0;
    }

    if (sizeBytes > maxBytes) {
      discovery.tooLarge.push({ path: sourcePath, reason: "too_large", sizeBytes });
      continue;
    }

    const file = { sourcePath, relativePath, sizeBytes };
    if (!options.registry.resolve(sourcePath)) {
      discovery.unsupported.push(file);
    } else {
      discovery.eligible.push(file);
    }
  }

  return discovery;
}

export function chunkFiles<T>(files: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  const step = Math.max(1, size);
  for (let i = 0; i < files.length; i += step) {
    chunks.push(files.slice(i, i + step));
  }
  return chunks;
}
