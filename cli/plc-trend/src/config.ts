import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { TagType } from "./schema.js";

export const DEFAULT_INTERVAL_MS = 1000;
export const DEFAULT_WINDOW = 3600;
export const DEFAULT_CONFIG_PATH = "plc-trend.json";

const TAG_TYPES: Record<string, TagType> = {
  B: "bit",
  BIT: "bit",
  W: "word",
  WORD: "word",
  F: "float",
  FLOAT: "float",
};

export const TagTypeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .refine((v) => Object.hasOwn(TAG_TYPES, v), { message: "type must be B, W or F" })
  .transform((v) => TAG_TYPES[v]);

export const TagRecordSchema = z.object({
  label: z.string().trim().min(1, "label is required"),
  register: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[DM][0-9]{4}$/, "register must look like D0002 or M0100"),
  type: TagTypeSchema,
});

export type TagRecord = z.infer<typeof TagRecordSchema>;

export const DeviceRecordSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_]{1,20}$/, "name must be 1-20 letters, digits or underscores"),
  ip: z.string().trim().ip({ version: "v4", message: "ip must be an IPv4 address" }),
  swapped: z
    .union([z.boolean(), z.literal(0), z.literal(1)])
    .optional()
    .default(false)
    .transform((v) => v === true || v === 1),
  tags: z.array(TagRecordSchema).min(1, "at least one tag is required"),
});

export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

export const ConfigFileSchema = z.object({
  title: z.string().optional(),
  interval_ms: z.number().int().min(100).optional(),
  window: z.number().int().min(1).max(86_400).optional(),
  devices: z.array(z.unknown()),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type RuntimeSettings = {
  configPath: string;
  driver: string;
  intervalMs: number;
  window: number;
  title: string;
  csvDir?: string;
  port?: number;
  terminal: boolean;
  simOffline: string[];
};

export function formatIssues(error: z.ZodError, root = "config"): string {
  return error.issues.map((issue) => `${issue.path.join(".") || root}: ${issue.message}`).join("; ");
}

export function parseConfig(raw: unknown): ConfigFile {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigurationError(formatIssues(parsed.error));
  return parsed.data;
}

export function loadConfigFile(path: string): ConfigFile {
  const full = resolve(path);
  if (!existsSync(full)) throw new ConfigurationError(`config file not found: ${full}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(full, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`cannot parse ${full}: ${errorMessage(err)}`);
  }
  return parseConfig(raw);
}

type SettingsSources = {
  args: Record<string, string | boolean | undefined>;
  env: NodeJS.ProcessEnv;
  file?: ConfigFile;
};

function pick(args: SettingsSources["args"], key: string): string | undefined {
  const v = args[key];
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

function positiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError(`${flag} must be a positive integer, got "${raw}"`);
  return n;
}

// Flags win over the config file; the environment fills what neither sets.
export function resolveSettings({ args, env, file }: SettingsSources): RuntimeSettings {
  const intervalMs = positiveInt(pick(args, "interval"), "--interval") ?? file?.interval_ms ?? DEFAULT_INTERVAL_MS;
  const window = positiveInt(pick(args, "window"), "--window") ?? file?.window ?? DEFAULT_WINDOW;
  const port = positiveInt(pick(args, "port") ?? (env.PLC_TREND_PORT?.trim() || undefined), "--port");
  const csvDir = pick(args, "csv-dir") ?? (env.PLC_TREND_CSV_DIR?.trim() || undefined);
  return {
    configPath: pick(args, "config") ?? (env.PLC_TREND_CONFIG?.trim() || DEFAULT_CONFIG_PATH),
    driver: pick(args, "driver") ?? (env.PLC_TREND_DRIVER?.trim() || "sim"),
    intervalMs,
    window,
    title: file?.title ?? `Multi-PLC Live Trends (${formatRate(intervalMs)})`,
    csvDir,
    port,
    terminal: args.quiet !== true,
    simOffline: (env.PLC_TREND_SIM_OFFLINE ?? "")
      .split(",")
      .map((a) => a.trim())
      .filter(Boolean),
  };
}

function formatRate(intervalMs: number): string {
  if (intervalMs === 1000) return "1 Hz";
  return `${intervalMs} ms`;
}
