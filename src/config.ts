import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_IDENTITY_OPTIONS } from "./identity.js";
import { logger } from "./logger.js";
import type { AppConfig } from "./types.js";

export const CONFIG_CANDIDATES = ["config/config.txt", "config.txt"];

export const DEFAULTS = {
  TIMEOUT: 5,
  WORKERS: 10,
  MAX_RETRY: 2,
  OUTPUT_ALL_FILE: "subscription_all.txt",
  IDENTITY_PAYLOAD_LENGTH: DEFAULT_IDENTITY_OPTIONS.payloadLength,
  IDENTITY_RAW_LENGTH: DEFAULT_IDENTITY_OPTIONS.rawLength,
} as const;

type IntegerKey = "TIMEOUT" | "WORKERS" | "MAX_RETRY" | "IDENTITY_PAYLOAD_LENGTH" | "IDENTITY_RAW_LENGTH";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

// Plain decimal digits only; Number() would also take "", "0x10" and "1e1".
const digits = z.string().trim().regex(/^\d+$/);
const positiveIntText = digits.pipe(z.coerce.number().int().positive());
const nonNegativeIntText = digits.pipe(z.coerce.number().int().nonnegative());

const INTEGER_FIELDS: Record<IntegerKey, z.ZodPipeline<z.ZodString, z.ZodNumber>> = {
  TIMEOUT: positiveIntText,
  WORKERS: positiveIntText,
  MAX_RETRY: nonNegativeIntText,
  IDENTITY_PAYLOAD_LENGTH: positiveIntText,
  IDENTITY_RAW_LENGTH: positiveIntText,
};

function isIntegerKey(key: string): key is IntegerKey {
  return key in INTEGER_FIELDS;
}

const AppConfigSchema = z.object({
  sources: z.array(z.string().min(1)),
  timeoutSeconds: positiveInt,
  maxRetries: nonNegativeInt,
  workerLimit: positiveInt,
  outputFile: z.string().trim().min(1),
  identity: z.object({
    payloadLength: positiveInt,
    rawLength: positiveInt,
  }),
});

/** Plain key/value view of a config file before validation. */
export interface RawConfig {
  sources: string[];
  values: Record<string, string>;
}

/**
 * Parses `KEY=VALUE` lines. `SOURCES=` may repeat and bare http(s) lines are
 * sources too; `#` comments and blank lines are skipped.
 */
export function parseConfigText(text: string): RawConfig {
  const raw: RawConfig = { sources: [], values: {} };
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (/^https?:\/\//i.test(line)) {
      raw.sources.push(line);
      continue;
    }
    const eq = line.indexOf("=");
    if (eq === -1) {
      logger.warn("Ignoring config line without '='", { line });
      continue;
    }
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    if (key === "SOURCES") {
      if (value) {
        raw.sources.push(value);
      }
    } else {
      raw.values[key] = value;
    }
  }
  return raw;
}

function readInteger(raw: RawConfig, key: IntegerKey): number {
  const value = raw.values[key];
  if (value === undefined) {
    return DEFAULTS[key];
  }
  const parsed = INTEGER_FIELDS[key].safeParse(value);
  if (!parsed.success) {
    logger.warn("Invalid config value, using default", { key, value, default: DEFAULTS[key] });
    return DEFAULTS[key];
  }
  return parsed.data;
}

export function buildConfig(raw: RawConfig, extraSources: string[] = []): AppConfig {
  for (const key of Object.keys(raw.values)) {
    if (key !== "OUTPUT_ALL_FILE" && !isIntegerKey(key)) {
      logger.warn("Unknown config key", { key });
    }
  }
  return AppConfigSchema.parse({
    sources: [...raw.sources, ...extraSources],
    timeoutSeconds: readInteger(raw, "TIMEOUT"),
    maxRetries: readInteger(raw, "MAX_RETRY"),
    workerLimit: readInteger(raw, "WORKERS"),
    outputFile: raw.values.OUTPUT_ALL_FILE || DEFAULTS.OUTPUT_ALL_FILE,
    identity: {
      payloadLength: readInteger(raw, "IDENTITY_PAYLOAD_LENGTH"),
      rawLength: readInteger(raw, "IDENTITY_RAW_LENGTH"),
    },
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** The explicit path when given, else the first existing default location. */
export async function resolveConfigPath(explicit?: string): Promise<string | null> {
  if (explicit) {
    return resolve(explicit);
  }
  for (const candidate of CONFIG_CANDIDATES) {
    const absPath = resolve(candidate);
    if (await exists(absPath)) {
      return absPath;
    }
  }
  return null;
}

export async function loadConfigFromFile(path: string, extraSources: string[] = []): Promise<AppConfig> {
  const absPath = resolve(path);
  const text = await readFile(absPath, "utf8");
  const config = buildConfig(parseConfigText(text), extraSources);
  logger.info("Config loaded", { path: absPath, sources: config.sources.length });
  return config;
}

export interface LoadConfigOptions {
  configPath?: string;
  extraSources?: string[];
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const path = await resolveConfigPath(options.configPath);
  if (!path) {
    logger.warn("No config file found; using defaults", { searched: CONFIG_CANDIDATES });
    return buildConfig({ sources: [], values: {} }, options.extraSources);
  }
  if (!(await exists(path))) {
    logger.warn("Config file not found", { path });
    return buildConfig({ sources: [], values: {} }, options.extraSources);
  }
  return loadConfigFromFile(path, options.extraSources);
}
