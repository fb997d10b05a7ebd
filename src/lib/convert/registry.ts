import { createLogger } from "../utils/logger";
import { detectFormat } from "./detect";
import type { Capability, CapabilityDescriptor, DetectedFormat } from "./types";

const log = createLogger("registry");

/**
 * Ordered list of conversion capabilities. Registration order is priority:
 * specialised converters first, catch-alls last. Duplicate names and
 * overlapping extensions are allowed.
 */
export class CapabilityRegistry {
  private readonly capabilities: Capability[] = [];

  register(capability: Capability): this {
    this.capabilities.push(capability);
    log.debug(
      `registered ${capability.name} (${capability.extensions.join(" ")}) at position ${this.capabilities.length}`,
    );
    return this;
  }

  /** Every capability that accepts the file, highest priority first. */
  candidates(filePath: string, format: DetectedFormat = detectFormat(filePath)): Capability[] {
    return this.capabilities.filter((cap) => cap.canHandle(filePath, format));
  }

  /** The highest-priority capability for the file, if any. */
  resolve(filePath: string, format: DetectedFormat = detectFormat(filePath)): Capability | undefined {
    return this.capabilities.find((cap) => cap.canHandle(filePath, format));
  }

  supportedFormats(): Set<string> {
    const formats = new Set<string>();
    for (const cap of this.capabilities) {
      for (const ext of cap.extensions) formats.add(ext);
    }
    return formats;
  }

  describe(): CapabilityDescriptor[] {
    return this.capabilities.map((cap) => ({
      name: cap.name,
      extensions: [...cap.extensions],
    }));
  }

  get size(): number {
    return this.capabilities.length;
  }
}

/**
 * Default `canHandle` for capabilities that only look at the detected
 * extension.
 */
export function handlesExtension(extensions: readonly string[]) {
  return (_filePath: string, format: DetectedFormat): boolean =>
    format.ext !== "" && extensions.includes(format.ext);
}
