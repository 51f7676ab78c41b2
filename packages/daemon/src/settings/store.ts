import fs from "fs";
import path from "path";
import type { GateTunables, Token } from "@gatewarden/shared";
import { settingsSchema, type Settings } from "./schema.js";

export class SettingsError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

/**
 * Flat JSON file holding operator settings and the token list.
 * A missing file yields defaults; anything unreadable or invalid throws SettingsError.
 */
export class SettingsStore {
  private settings: Settings;

  private constructor(
    private readonly filePath: string,
    settings: Settings,
  ) {
    this.settings = settings;
  }

  static load(filePath: string): SettingsStore {
    return new SettingsStore(filePath, readSettings(filePath));
  }

  /** Store that never touches disk. */
  static inMemory(initial: unknown = {}): SettingsStore {
    return new SettingsStore("", parseSettings(initial, "<memory>"));
  }

  get(): Settings {
    return this.settings;
  }

  getTunables(): GateTunables {
    return { ...this.settings.gate };
  }

  updateTunables(changes: Partial<GateTunables>): GateTunables {
    const merged = { ...this.settings.gate, ...definedOnly(changes) };
    this.settings = parseSettings({ ...this.settings, gate: merged }, this.filePath);
    this.save();
    return this.getTunables();
  }

  updateLogging(changes: Partial<Settings["logging"]>): Settings["logging"] {
    this.settings = parseSettings(
      { ...this.settings, logging: { ...this.settings.logging, ...definedOnly(changes) } },
      this.filePath,
    );
    this.save();
    return { ...this.settings.logging };
  }

  saveTokens(tokens: Token[]): void {
    this.settings = { ...this.settings, tokens: tokens.map((t) => ({ ...t })) };
    this.save();
  }

  save(): void {
    if (!this.filePath) return;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.settings, null, 2) + "\n");
  }
}

function definedOnly(changes: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
}

function readSettings(filePath: string): Settings {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return settingsSchema.parse({});
    }
    throw new SettingsError(`Cannot read settings: ${String(err)}`, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SettingsError(`Settings file is not valid JSON: ${String(err)}`, filePath);
  }
  return parseSettings(data, filePath);
}

function parseSettings(data: unknown, filePath: string): Settings {
  const result = settingsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SettingsError(`Invalid settings: ${issues}`, filePath);
  }
  return result.data;
}
