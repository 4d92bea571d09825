import * as fs from "node:fs";
import * as path from "node:path";
import type { PluginConfig } from "./config.js";
import { loadDeclarations } from "./declarations.js";
import { generate, type Generation } from "./generate.js";
import { WATCH_SERVICE_NAME } from "./service.js";

export const EXIT_USAGE = 64;

function log(message: string): void {
  process.stderr.write(`[himalaya] ${message}\n`);
}

function load(config: PluginConfig): Generation | undefined {
  const generation = generate(loadDeclarations(config.declarationsPath));
  if (!generation) {
    log("programs.himalaya is disabled, nothing to generate");
    return undefined;
  }
  if (generation.needsNotmuch) {
    log("notmuch backend in use: the himalaya binary must be built with the notmuch feature");
  }
  return generation;
}

function writeFiles(config: PluginConfig, generation: Generation): void {
  const configPath = path.join(config.configDir, "config.toml");
  fs.mkdirSync(config.configDir, { recursive: true });
  fs.writeFileSync(configPath, generation.configToml);
  log(`Wrote ${configPath} (${generation.accounts.length} account(s))`);

  const unitPath = path.join(config.unitDir, `${WATCH_SERVICE_NAME}.service`);
  if (generation.serviceUnit) {
    fs.mkdirSync(config.unitDir, { recursive: true });
    fs.writeFileSync(unitPath, generation.serviceUnit);
    log(`Wrote ${unitPath}`);
  } else if (fs.existsSync(unitPath)) {
    fs.rmSync(unitPath);
    log(`Watcher disabled, removed ${unitPath}`);
  }
}

/** Runs one command and returns the process exit code. */
export function run(cmd: string, config: PluginConfig): number {
  try {
    switch (cmd) {
      case "generate": {
        const generation = load(config);
        if (generation) writeFiles(config, generation);
        return 0;
      }

      case "config": {
        const generation = load(config);
        if (generation) process.stdout.write(generation.configToml);
        return 0;
      }

      case "service": {
        const generation = load(config);
        if (generation?.serviceUnit) process.stdout.write(generation.serviceUnit);
        return 0;
      }

      default:
        process.stderr.write(`Unknown command: ${cmd}\n`);
        return EXIT_USAGE;
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    log(`Fatal: ${msg}`);
    return 1;
  }
}
