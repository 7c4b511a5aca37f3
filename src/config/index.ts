export { configSchema, logLevelSchema, type Config, type LogLevel } from "./schema.js";
export { loadConfig, parseMCPSettings, mcpSettingsSchema, type MCPSettings } from "./loader.js";
