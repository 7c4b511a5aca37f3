import { z } from "zod";

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const configSchema = z
  .object({
    // Connection
    host: z.string().min(1),
    port: z.number().int().positive().default(443),

    // Authentication
    username: z.string().optional(),
    password: z.string().optional(),
    apiToken: z.string().optional(),
    verifySsl: z.boolean().default(true),

    // HTTP
    timeout: z.number().int().positive().default(30000),

    // Long-running operations
    pollingIntervalSeconds: z.number().int().min(1).max(60).default(5),
    taskTimeoutSeconds: z.number().int().nonnegative().default(0),
    uploadChunkSize: z.number().int().positive().default(262144),

    // Behavior
    safeMode: z.boolean().default(false),
    logLevel: logLevelSchema.default("info"),
  })
  .refine((config) => Boolean(config.apiToken) || Boolean(config.username && config.password), {
    message: "Provide apiToken or username and password",
    path: ["apiToken"],
  });

export type Config = z.infer<typeof configSchema>;
