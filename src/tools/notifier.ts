import type { ServerNotification } from "@modelcontextprotocol/sdk/types.js";
import type { ProgressListener } from "../core/progress.js";
import { logger } from "../logger.js";

export interface NotificationSink {
  notification(notification: ServerNotification): Promise<void>;
}

/**
 * Forwards progress events to the client as `notifications/progress` for one
 * request's progress token. The reported progress never goes backwards.
 */
export function createProgressNotifier(sink: NotificationSink, progressToken: string | number): ProgressListener {
  let progress = 0;

  return (event) => {
    progress = event.percent === undefined ? progress + 1 : Math.max(progress, event.percent);
    sink
      .notification({
        method: "notifications/progress",
        params: {
          progressToken,
          progress,
          ...(event.percent === undefined ? {} : { total: 100 }),
          message: event.message,
        },
      })
      .catch((error: unknown) => {
        logger.debug(
          `Dropped progress notification for ${String(progressToken)}: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      });
  };
}
