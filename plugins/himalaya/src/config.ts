import * as os from "node:os";
import * as path from "node:path";

export interface PluginConfig {
  declarationsPath: string;
  configDir: string;
  unitDir: string;
}

export function loadConfig(): PluginConfig {
  const xdgConfigHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return {
    declarationsPath:
      process.env.HIMALAYA_DECLARATIONS_PATH || path.join(xdgConfigHome, "himalaya", "accounts.yaml"),
    configDir: process.env.HIMALAYA_CONFIG_DIR || path.join(xdgConfigHome, "himalaya"),
    unitDir: process.env.HIMALAYA_UNIT_DIR || path.join(xdgConfigHome, "systemd", "user"),
  };
}
