import { resolve } from "path";
import { homedir } from "os";
import type { LogLevel } from "@gatewarden/shared";

export interface GatewardenConfig {
  apiPort: number;
  apiHost: string;
  settingsPath: string;
  dbPath: string;
  /** Overrides `logging.level` from the settings file when set */
  logLevel?: LogLevel;
}

const gatewardenHome = resolve(homedir(), ".gatewarden");

const defaults: GatewardenConfig = {
  apiPort: 3100,
  apiHost: "0.0.0.0",
  settingsPath: resolve(gatewardenHome, "settings.json"),
  dbPath: resolve(gatewardenHome, "activity.db"),
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function expandHome(p: string): string {
  return p.replace(/^~(?=$|\/)/, homedir());
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewardenConfig {
  const port = parseInt(env.GATEWARDEN_PORT ?? String(defaults.apiPort), 10);
  return {
    ...defaults,
    apiPort: Number.isNaN(port) ? defaults.apiPort : port,
    apiHost: env.GATEWARDEN_HOST ?? defaults.apiHost,
    settingsPath: expandHome(env.GATEWARDEN_SETTINGS_PATH ?? defaults.settingsPath),
    dbPath: expandHome(env.GATEWARDEN_DB_PATH ?? defaults.dbPath),
    logLevel: parseLogLevel(env.GATEWARDEN_LOG_LEVEL),
  };
}
