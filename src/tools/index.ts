export { toolDefinitions } from "./definitions.js";
export {
  registerAllTools,
  registerTaskTools,
  registerImportTools,
  registerNasTools,
  registerFileTools,
  type ToolContext,
  type ToolHandler,
  type ToolRegistry,
} from "./handlers.js";
export { createProgressNotifier, type NotificationSink } from "./notifier.js";
