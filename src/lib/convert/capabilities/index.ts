import type { Settings } from "../../config";
import { CapabilityRegistry } from "../registry";
import { htmlCapability } from "./html";
import { markitdownCapability } from "./markitdown";
import { PandocCapability } from "./pandoc";
import { plaintextCapability } from "./plaintext";
import { wordCapability } from "./word";

export { createTurndown, htmlCapability, htmlToMarkdown } from "./html";
export { markitdownCapability } from "./markitdown";
export { PandocCapability, pandocVersion } from "./pandoc";
export { parseEmail, plaintextCapability } from "./plaintext";
export { wordCapability } from "./word";

/**
 * Builds the standard chain: specialised readers first, pandoc last. Each
 * process builds its own registry.
 */
export function createDefaultRegistry(
  settings: Pick<Settings, "pandocPath" | "pandocTimeoutMs">,
): CapabilityRegistry {
  return new CapabilityRegistry()
    .register(plaintextCapability)
    .register(wordCapability)
    .register(htmlCapability)
    .register(markitdownCapability)
    .register(
      new PandocCapability({
        binary: settings.pandocPath,
        timeoutMs: settings.pandocTimeoutMs,
      }),
    );
}
