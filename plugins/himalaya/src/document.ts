import { stringify } from "smol-toml";
import { compact, type TomlDraft, type TomlTable } from "./toml.js";

/**
 * Global settings and per-account tables live side by side at the top level:
 * scalar CLI options next to one table per account name.
 */
export function assembleDocument(
  globalSettings: TomlDraft,
  accountConfigs: Record<string, TomlTable>,
): TomlTable {
  return { ...compact(globalSettings), ...accountConfigs };
}

export function renderDocument(document: TomlTable): string {
  return stringify(document);
}
