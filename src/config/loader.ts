import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { configSchema, type Config } from "./schema.js";
import { logger } from "../logger.js";

export const mcpSettingsSchema = z.object({
  host: z.string().optional(),
  port: z.number().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  apiToken: z.string().optional(),
  verifySsl: z.boolean().optional(),
  timeout: z.number().optional(),
  pollingIntervalSeconds: z.number().optional(),
  taskTimeoutSeconds: z.number().optional(),
  uploadChunkSize: z.number().optional(),
  safeMode: z.boolean().optional(),
  logLevel: z.string().optional(),
});

export type MCPSettings = z.infer<typeof mcpSettingsSchema>;

/** Parses the MCP_SETTINGS JSON handed over by the MCP client. */
export function parseMCPSettings(json: string | undefined): MCPSettings {
  if (!json) {
    return {};
  }
  return mcpSettingsSchema.parse(JSON.parse(json));
}

export const CONFIG_FILE_NAME = "vergeos-config.json";

function loadFromEnv(): Partial<MCPSettings> {
  const parseBoolean = (val: string | undefined): boolean | undefined => {
    if (val === undefined) return undefined;
    return val.toLowerCase() === "true";
  };

  const parseNumber = (val: string | undefined): number | undefined => {
    if (val === undefined) return undefined;
    const num = parseInt(val, 10);
    return isNaN(num) ? undefined : num;
  };

  return {
    host: process.env.VERGEOS_HOST,
    port: parseNumber(process.env.VERGEOS_PORT),
    username: process.env.VERGEOS_USERNAME,
    password: process.env.VERGEOS_PASSWORD,
    apiToken: process.env.VERGEOS_API_TOKEN,
    verifySsl: parseBoolean(process.env.VERGEOS_VERIFY_SSL),
    timeout: parseNumber(process.env.VERGEOS_TIMEOUT),
    pollingIntervalSeconds: parseNumber(process.env.VERGEOS_POLLING_INTERVAL),
    taskTimeoutSeconds: parseNumber(process.env.VERGEOS_TASK_TIMEOUT),
    uploadChunkSize: parseNumber(process.env.VERGEOS_UPLOAD_CHUNK_SIZE),
    safeMode: parseBoolean(process.env.VERGEOS_SAFE_MODE),
    logLevel: process.env.VERGEOS_LOG_LEVEL?.toLowerCase(),
  };
}

function loadFromFile(cwd: string): Record<string, unknown> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      logger.warn(`Ignoring ${configPath}: expected a JSON object`);
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  } catch (error) {
    logger.warn(
      `Ignoring ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
    return {};
  }
}

function removeUndefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([_, v]) => v !== undefined)
  );
}

export function loadConfig(mcpSettings: MCPSettings, cwd: string = process.cwd()): Config {
  const fileConfig = loadFromFile(cwd);
  const envConfig = loadFromEnv();

  // Priority: MCP settings > env > file
  const merged = {
    ...removeUndefined(fileConfig),
    ...removeUndefined(envConfig),
    ...removeUndefined(mcpSettings),
  };

  return configSchema.parse(merged);
}
