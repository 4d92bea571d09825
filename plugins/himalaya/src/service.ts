import type { WatchOptions } from "./declarations.js";

export const WATCH_SERVICE_NAME = "himalaya-watch";
export const WATCH_RESTART_SEC = 10;

export interface WatchService {
  description: string;
  after: string[];
  wantedBy: string[];
  execStart: string[];
  execSearchPath: string;
  environment: string[];
  restart: "always";
  restartSec: number;
}

/** Returns undefined when the watcher is disabled: no unit at all. */
export function buildWatchService(
  watch: WatchOptions,
  binaryPath: string,
): WatchService | undefined {
  if (!watch.enable) return undefined;

  const execStart = [binaryPath, "envelopes", "watch"];
  if (watch.settings.account !== null) {
    execStart.push("--account", watch.settings.account);
  }

  return {
    description: "Email client Himalaya CLI envelopes watcher service",
    after: ["network.target"],
    wantedBy: ["default.target"],
    execStart,
    execSearchPath: "/bin",
    environment: Object.entries(watch.environment).map(([key, value]) => `${key}=${value}`),
    restart: "always",
    restartSec: WATCH_RESTART_SEC,
  };
}

function quoteEnvironment(entry: string): string {
  if (!/[\s"\\]/.test(entry)) return entry;
  return `"${entry.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function renderUnit(service: WatchService): string {
  const lines = [
    "[Unit]",
    `Description=${service.description}`,
    ...service.after.map((unit) => `After=${unit}`),
    "",
    "[Service]",
    ...service.environment.map((entry) => `Environment=${quoteEnvironment(entry)}`),
    `ExecSearchPath=${service.execSearchPath}`,
    `ExecStart=${service.execStart.join(" ")}`,
    `Restart=${service.restart}`,
    `RestartSec=${service.restartSec}`,
    "",
    "[Install]",
    ...service.wantedBy.map((target) => `WantedBy=${target}`),
  ];
  return lines.join("\n") + "\n";
}
