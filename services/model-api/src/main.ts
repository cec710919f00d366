import "reflect-metadata";

import type { Server } from "node:http";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import morgan from "morgan";

import { AppModule } from "./app.module.js";
import type { AppConfig } from "./config.js";
import type { PipelineState } from "./pipeline/pipeline.state.js";
import { shutdownOnFatal } from "./shutdown.js";
import { APP_CONFIG, PIPELINE_STATE } from "./tokens.js";

async function bootstrap() {
  const logger = new Logger("Bootstrap");
  const app = await NestFactory.create(AppModule);
  app.use(morgan("tiny"));
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(APP_CONFIG);
  const pipeline = app.get<PipelineState>(PIPELINE_STATE);
  pipeline.worker.onFatal(shutdownOnFatal(app, logger));

  const server: Server = app.getHttpServer();
  server.requestTimeout = config.requestTimeoutMs;

  await app.listen(config.port);
  logger.log(`Model API listening on port ${config.port}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap model API", error);
    process.exitCode = 1;
  });
}
