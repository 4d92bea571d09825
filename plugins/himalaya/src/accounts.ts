import type { Account } from "./declarations.js";

export type AccountPredicate = (account: Account, name: string) => boolean;

const himalayaEnabled: AccountPredicate = (account) => account.himalaya.enable;

export function selectAccounts(
  accounts: Record<string, Account>,
  isEnabled: AccountPredicate = himalayaEnabled,
): Record<string, Account> {
  const selected: Record<string, Account> = {};
  for (const [name, account] of Object.entries(accounts)) {
    if (isEnabled(account, name)) selected[name] = account;
  }
  return selected;
}

// notmuch support is an optional build feature of the CLI
export function needsNotmuchFeature(accounts: Record<string, Account>): boolean {
  return Object.values(accounts).some((account) => account.notmuch.enable);
}
