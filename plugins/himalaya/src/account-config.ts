import * as path from "node:path";
import type { Account } from "./declarations.js";
import { encryptionMode, resolveBackends, type RetrievalBackend, type SendBackend } from "./backends.js";
import { compact, deepMerge, type TomlDraft, type TomlTable } from "./toml.js";

export interface AccountContext {
  name: string;
  /** Shared mail store; also where the notmuch database lives. */
  maildirBasePath: string;
  sendmailCommand: string;
}

type Server = NonNullable<Account["imap"]>;

export function passwordCommandLine(account: Account): string | undefined {
  return account.passwordCommand?.join(" ");
}

export function maildirRoot(account: Account, context: AccountContext): string | undefined {
  if (!account.maildir) return undefined;
  return path.posix.join(context.maildirBasePath, account.maildir.path ?? context.name);
}

function identityFragment(account: Account): TomlDraft {
  return {
    email: account.address,
    "display-name": account.realName,
    default: account.primary,
    folder: {
      alias: {
        inbox: account.folders.inbox,
        sent: account.folders.sent,
        drafts: account.folders.drafts,
        trash: account.folders.trash,
      },
    },
  };
}

function signatureFragment(account: Account): TomlDraft | undefined {
  // attach mode has no CLI counterpart yet
  if (account.signature.showSignature !== "append") return undefined;
  return {
    signature: account.signature.text,
    "signature-delim": account.signature.delimiter,
  };
}

function serverFragment(server: Server, account: Account): TomlDraft {
  return {
    host: server.host,
    port: server.port,
    encryption: encryptionMode(server.tls),
    login: account.userName,
    passwd: { cmd: passwordCommandLine(account) },
  };
}

function retrievalFragment(
  backend: RetrievalBackend,
  account: Account,
  context: AccountContext,
): TomlDraft | undefined {
  switch (backend) {
    case "notmuch":
      return { backend: "notmuch", notmuch: { "database-path": context.maildirBasePath } };
    case "imap":
      return account.imap ? { backend: "imap", imap: serverFragment(account.imap, account) } : undefined;
    case "maildir":
      return { backend: "maildir", maildir: { "root-dir": maildirRoot(account, context) } };
    case "none":
      return undefined;
  }
}

function sendFragment(
  backend: SendBackend,
  account: Account,
  context: AccountContext,
): TomlDraft | undefined {
  switch (backend) {
    case "smtp":
      return account.smtp
        ? { message: { send: { backend: "smtp" } }, smtp: serverFragment(account.smtp, account) }
        : undefined;
    case "sendmail":
      return { message: { send: { backend: "sendmail" } }, sendmail: { cmd: context.sendmailCommand } };
    case "none":
      return undefined;
  }
}

/** Prune each present fragment and merge them in order; absent ones add nothing. */
export function composeFragments(fragments: Array<TomlDraft | undefined>): TomlTable {
  let table: TomlTable = {};
  for (const fragment of fragments) {
    if (fragment) table = deepMerge(table, compact(fragment));
  }
  return table;
}

export function buildAccountConfig(account: Account, context: AccountContext): TomlTable {
  const backends = resolveBackends(account);
  const assembled = composeFragments([
    identityFragment(account),
    signatureFragment(account),
    retrievalFragment(backends.retrieval, account, context),
    sendFragment(backends.send, account, context),
  ]);
  return deepMerge(assembled, account.himalaya.settings);
}
