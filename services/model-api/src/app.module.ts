import { Module } from "@nestjs/common";
import { MulterModule } from "@nestjs/platform-express";

import type { AppConfig } from "./config.js";
import { ConfigModule } from "./config.module.js";
import { HealthController } from "./controllers/health.controller.js";
import { PredictController } from "./controllers/predict.controller.js";
import { ResultController } from "./controllers/result.controller.js";
import { createWarmupImage } from "./imaging/warmup.js";
import type { DetectionModel } from "./model/detection-model.js";
import { HttpDetectionModel } from "./model/http-detection.model.js";
import { createPipeline } from "./pipeline/pipeline.state.js";
import { APP_CONFIG, DETECTION_MODEL, PIPELINE_STATE } from "./tokens.js";

const modelProvider = {
  provide: DETECTION_MODEL,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): DetectionModel =>
    new HttpDetectionModel(config.model, createWarmupImage(config.warmup)),
};

// Resolves only after the model is loaded and warmed, so nothing is served before that.
const pipelineProvider = {
  provide: PIPELINE_STATE,
  inject: [DETECTION_MODEL],
  useFactory: (model: DetectionModel) => createPipeline(model),
};

@Module({
  imports: [
    ConfigModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        limits: { fileSize: config.maxUploadBytes, files: 1 },
      }),
    }),
  ],
  controllers: [HealthController, PredictController, ResultController],
  providers: [modelProvider, pipelineProvider],
})
export class AppModule {}
