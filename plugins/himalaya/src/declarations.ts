import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { TomlValue } from "./toml.js";

const tomlValue: z.ZodType<TomlValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(tomlValue),
    z.record(z.string(), tomlValue),
  ]),
);

/** Free-form settings handed to the CLI as they are. */
const freeformSettings = z.record(z.string(), tomlValue);

export const tlsSchema = z.object({
  enable: z.boolean().default(true),
  useStartTls: z.boolean().default(false),
});

const serverSchema = z.object({
  host: z.string(),
  port: z.number().int().positive().optional(),
  tls: tlsSchema.default({}),
});

export const accountSchema = z.object({
  address: z.string(),
  realName: z.string().optional(),
  primary: z.boolean().default(false),
  userName: z.string().optional(),
  // a plain string is split on single spaces, never shell-parsed
  passwordCommand: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((cmd) => (typeof cmd === "string" ? cmd.split(" ") : cmd)),
  folders: z
    .object({
      inbox: z.string().default("Inbox"),
      sent: z.string().default("Sent"),
      drafts: z.string().default("Drafts"),
      trash: z.string().default("Trash"),
    })
    .default({}),
  imap: serverSchema.nullable().default(null),
  smtp: serverSchema.nullable().default(null),
  maildir: z.object({ path: z.string().optional() }).nullable().default(null),
  notmuch: z.object({ enable: z.boolean().default(false) }).default({}),
  msmtp: z.object({ enable: z.boolean().default(false) }).default({}),
  signature: z
    .object({
      text: z.string().default(""),
      delimiter: z.string().default("-- \n"),
      showSignature: z.enum(["append", "attach", "none"]).default("none"),
    })
    .default({}),
  himalaya: z
    .object({
      enable: z.boolean().default(false),
      settings: freeformSettings.default({}),
    })
    .default({}),
});

export const moduleOptionsSchema = z.object({
  programs: z
    .object({
      himalaya: z
        .object({
          enable: z.boolean().default(false),
          package: z.string().default("/usr"),
          // global settings may carry explicit nulls; they are pruned on output
          settings: z.record(z.string(), tomlValue.nullable()).default({}),
        })
        .default({}),
      msmtp: z.object({ package: z.string().default("/usr") }).default({}),
    })
    .default({}),
  services: z
    .object({
      "himalaya-watch": z
        .object({
          enable: z.boolean().default(false),
          environment: z.record(z.string(), z.string()).default({}),
          settings: z
            .object({ account: z.string().nullable().default(null) })
            .default({}),
        })
        .default({}),
    })
    .default({}),
  accounts: z
    .object({
      email: z
        .object({
          maildirBasePath: z.string().default(() => path.join(os.homedir(), "Maildir")),
          accounts: z.record(z.string(), accountSchema).default({}),
        })
        .default({}),
    })
    .default({}),
});

export type TlsSettings = z.infer<typeof tlsSchema>;
export type Account = z.infer<typeof accountSchema>;
export type ModuleOptions = z.infer<typeof moduleOptionsSchema>;
export type WatchOptions = ModuleOptions["services"]["himalaya-watch"];

export class DeclarationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "DeclarationError";
  }
}

export function parseDeclarations(raw: unknown): ModuleOptions {
  const result = moduleOptionsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new DeclarationError("Invalid declarations", issues);
  }
  return result.data;
}

export function loadDeclarations(declarationsPath: string): ModuleOptions {
  let content: string;
  try {
    content = fs.readFileSync(declarationsPath, "utf-8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DeclarationError(`Cannot read ${declarationsPath}: ${msg}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DeclarationError(`Invalid YAML in ${declarationsPath}: ${msg}`);
  }

  return parseDeclarations(raw);
}
