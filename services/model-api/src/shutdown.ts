import { Logger, type INestApplication } from "@nestjs/common";

import type { FatalListener } from "./pipeline/inference.worker.js";

/** Marks the process as failed and closes the app once the worker has died. */
export function shutdownOnFatal(app: Pick<INestApplication, "close">, logger = new Logger("Shutdown")): FatalListener {
  return (error) => {
    logger.error(`Shutting down after fatal model failure: ${error.message}`);
    process.exitCode = 1;
    app.close().catch((closeError: unknown) => {
      logger.error(`Failed to close application: ${String(closeError)}`);
    });
  };
}
