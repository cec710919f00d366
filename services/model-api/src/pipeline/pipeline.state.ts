import { Logger, type OnModuleDestroy } from "@nestjs/common";

import type { DetectionModel } from "../model/detection-model.js";
import type { DecodedImage, Detection, DetectionBatch, PredictionResult } from "../types.js";
import { sortByConfidence, toPredictionResult, type Clock } from "./detection-batch.js";
import { ExclusiveModel } from "./exclusive-model.js";
import { InferenceWorker, type PendingImage } from "./inference.worker.js";
import { Mailbox } from "./mailbox.js";
import { ResultStore } from "./result-store.js";

export interface PipelineOptions {
  clock?: Clock;
}

/**
 * Process-wide pipeline: one mailbox, one worker, one result store and the
 * gate in front of the model. Request handlers only see this object.
 */
export class PipelineState implements OnModuleDestroy {
  private readonly logger = new Logger(PipelineState.name);
  readonly mailbox = new Mailbox<PendingImage>();
  readonly store = new ResultStore();
  readonly model: ExclusiveModel;
  readonly worker: InferenceWorker;
  private sequence = 0;

  constructor(model: DetectionModel, options: PipelineOptions = {}) {
    this.model = new ExclusiveModel(model);
    this.worker = new InferenceWorker(this.mailbox, this.model, this.store, options);
  }

  /** Hands an image to the worker, replacing any image it has not claimed yet. */
  submit(image: DecodedImage): number {
    this.sequence += 1;
    const displaced = this.mailbox.submit({ sequence: this.sequence, image });
    if (displaced) {
      this.logger.debug(`Discarded stale image #${displaced.sequence} in favour of #${this.sequence}`);
    }
    return this.sequence;
  }

  snapshot(): DetectionBatch | undefined {
    return this.store.snapshot();
  }

  result(): PredictionResult {
    return toPredictionResult(this.store.snapshot());
  }

  async warmup(): Promise<Detection[]> {
    const detections = await this.model.run((model) => model.warmup());
    return sortByConfidence(detections);
  }

  async onModuleDestroy(): Promise<void> {
    await this.worker.stop();
  }
}

/** Loads and warms the model, then starts the worker. Rejects if either step fails. */
export async function createPipeline(model: DetectionModel, options: PipelineOptions = {}): Promise<PipelineState> {
  const logger = new Logger("Pipeline");
  const startedAt = Date.now();
  await model.load();
  const state = new PipelineState(model, options);
  const warmup = await state.warmup();
  logger.log(`Model ready after ${Date.now() - startedAt}ms (warmup: ${warmup.length} detection(s))`);
  state.worker.start();
  return state;
}
