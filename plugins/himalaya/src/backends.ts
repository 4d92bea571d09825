import type { Account, TlsSettings } from "./declarations.js";

export type RetrievalBackend = "notmuch" | "imap" | "maildir" | "none";
export type SendBackend = "smtp" | "sendmail" | "none";
export type EncryptionMode = "start-tls" | "tls" | "none";

export interface ResolvedBackends {
  retrieval: RetrievalBackend;
  send: SendBackend;
}

/**
 * First enabled backend wins: notmuch, then IMAP, then Maildir for reading;
 * SMTP, then sendmail for sending. Accounts with nothing configured resolve
 * to "none" and the matching keys are left out of the generated config.
 */
export function resolveBackends(account: Account): ResolvedBackends {
  let retrieval: RetrievalBackend = "none";
  if (account.notmuch.enable) retrieval = "notmuch";
  else if (account.imap) retrieval = "imap";
  else if (account.maildir) retrieval = "maildir";

  let send: SendBackend = "none";
  if (account.smtp) send = "smtp";
  else if (account.msmtp.enable) send = "sendmail";

  return { retrieval, send };
}

/** STARTTLS takes precedence over the plain TLS flag. */
export function encryptionMode(tls: TlsSettings): EncryptionMode {
  if (tls.useStartTls) return "start-tls";
  if (tls.enable) return "tls";
  return "none";
}
