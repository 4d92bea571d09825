import { buildAccountConfig } from "./account-config.js";
import { needsNotmuchFeature, selectAccounts } from "./accounts.js";
import type { ModuleOptions } from "./declarations.js";
import { assembleDocument, renderDocument } from "./document.js";
import { buildWatchService, renderUnit } from "./service.js";
import type { TomlTable } from "./toml.js";

export interface Generation {
  configToml: string;
  /** Unit file text; undefined when the watcher is disabled. */
  serviceUnit?: string;
  accounts: string[];
  needsNotmuch: boolean;
}

export function binaryPath(options: ModuleOptions): string {
  return `${options.programs.himalaya.package}/bin/himalaya`;
}

export function sendmailCommand(options: ModuleOptions): string {
  return `${options.programs.msmtp.package}/bin/msmtp`;
}

export function generate(options: ModuleOptions): Generation | undefined {
  const himalaya = options.programs.himalaya;
  if (!himalaya.enable) return undefined;

  const { maildirBasePath, accounts } = options.accounts.email;
  const selected = selectAccounts(accounts);

  const accountConfigs: Record<string, TomlTable> = {};
  for (const [name, account] of Object.entries(selected)) {
    accountConfigs[name] = buildAccountConfig(account, {
      name,
      maildirBasePath,
      sendmailCommand: sendmailCommand(options),
    });
  }

  const document = assembleDocument(himalaya.settings, accountConfigs);
  const service = buildWatchService(options.services["himalaya-watch"], binaryPath(options));

  return {
    configToml: renderDocument(document),
    serviceUnit: service ? renderUnit(service) : undefined,
    accounts: Object.keys(selected),
    needsNotmuch: needsNotmuchFeature(selected),
  };
}

export { selectAccounts, needsNotmuchFeature } from "./accounts.js";
export { resolveBackends, encryptionMode } from "./backends.js";
export type { ResolvedBackends, RetrievalBackend, SendBackend, EncryptionMode } from "./backends.js";
export { buildAccountConfig, composeFragments, type AccountContext } from "./account-config.js";
export { assembleDocument, renderDocument } from "./document.js";
export { buildWatchService, renderUnit, type WatchService } from "./service.js";
export { compact, deepMerge, isTable, type TomlTable, type TomlValue, type TomlDraft } from "./toml.js";
export {
  DeclarationError,
  loadDeclarations,
  parseDeclarations,
  type Account,
  type ModuleOptions,
} from "./declarations.js";
