import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { accountSchema, type Account } from "../src/declarations.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const EXAMPLE_DECLARATIONS = path.join(__dirname, "../config/accounts.example.yaml");

export function makeAccount(fields: Record<string, unknown> = {}): Account {
  return accountSchema.parse({ address: "bob@example.com", ...fields });
}
