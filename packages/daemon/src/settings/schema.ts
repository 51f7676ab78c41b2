import { z } from "zod";

export const tokenSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  enabled: z.boolean().default(true),
});

export const serviceCallSchema = z.object({
  domain: z.string().min(1),
  service: z.string().min(1),
  /** Falls back to `actuator.gateEntityId` when omitted */
  entityId: z.string().min(1).optional(),
  data: z.record(z.unknown()).optional(),
});

export const actuatorSchema = z.object({
  provider: z.enum(["home_assistant", "dummy"]).default("dummy"),
  url: z.string().default(""),
  token: z.string().default(""),
  gateEntityId: z.string().min(1).default("cover.gate"),
  openAction: serviceCallSchema.default({ domain: "cover", service: "open_cover" }),
  closeAction: serviceCallSchema.default({ domain: "cover", service: "close_cover" }),
  /** Name of a `notify.*` service; notifications are skipped when unset */
  notifyService: z.string().min(1).optional(),
  retryAttempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(500),
});

const seconds = z.number().positive();

export const gateTunablesSchema = z.object({
  autoCloseTimeout: seconds.default(300),
  sessionTimeout: seconds.default(60),
  statusCheckInterval: seconds.default(30),
  bleScanInterval: seconds.default(5),
  tokenIdleTimeout: seconds.default(30),
  autoClosePollInterval: seconds.default(10),
});

export const bleSchema = z.object({
  adapter: z.string().min(1).default("hci0"),
});

export const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().min(1).optional(),
  activityMaxEntries: z.number().int().positive().default(1000),
  activityMode: z.enum(["suppress", "extended"]).default("suppress"),
});

export const settingsSchema = z.object({
  actuator: actuatorSchema.default({}),
  gate: gateTunablesSchema.default({}),
  ble: bleSchema.default({}),
  tokens: z.array(tokenSchema).default([]),
  logging: loggingSchema.default({}),
});

export type Settings = z.infer<typeof settingsSchema>;
export type ActuatorSettings = z.infer<typeof actuatorSchema>;
export type ServiceCall = z.infer<typeof serviceCallSchema>;
