import { Logger } from "@nestjs/common";

import { FatalModelError } from "../errors.js";
import type { DecodedImage } from "../types.js";
import { buildBatch, unixSeconds, type Clock } from "./detection-batch.js";
import type { ExclusiveModel } from "./exclusive-model.js";
import type { Mailbox } from "./mailbox.js";
import type { ResultStore } from "./result-store.js";

export interface PendingImage {
  sequence: number;
  image: DecodedImage;
}

export interface InferenceWorkerOptions {
  clock?: Clock;
}

export type FatalListener = (error: Error) => void;

export class InferenceWorker {
  private readonly logger = new Logger(InferenceWorker.name);
  private readonly clock: Clock;
  private readonly fatalListeners: FatalListener[] = [];
  private loop: Promise<void> | undefined;
  private processedCount = 0;
  private failedCount = 0;

  constructor(
    private readonly mailbox: Mailbox<PendingImage>,
    private readonly model: ExclusiveModel,
    private readonly store: ResultStore,
    options: InferenceWorkerOptions = {},
  ) {
    this.clock = options.clock ?? unixSeconds;
  }

  get processed(): number {
    return this.processedCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  /** Called once if the model reports an unrecoverable failure. */
  onFatal(listener: FatalListener): void {
    this.fatalListeners.push(listener);
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.loop = this.run().catch((error: unknown) => this.handleFatal(error));
  }

  /** Closes the mailbox and waits for an in-flight inference to settle. */
  async stop(): Promise<void> {
    this.mailbox.close();
    await this.loop;
  }

  private async run(): Promise<void> {
    for (;;) {
      const pending = await this.mailbox.take();
      if (!pending) {
        return;
      }
      await this.process(pending);
    }
  }

  private async process(pending: PendingImage): Promise<void> {
    const startedAt = Date.now();
    try {
      const detections = await this.model.run((model) => model.infer(pending.image));
      this.store.publish(buildBatch(detections, this.clock));
      this.processedCount += 1;
      this.logger.debug(
        `Published ${detections.length} detection(s) for image #${pending.sequence} in ${Date.now() - startedAt}ms`,
      );
    } catch (error) {
      if (error instanceof FatalModelError) {
        throw error;
      }
      this.failedCount += 1;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Inference failed for image #${pending.sequence}: ${message}`);
    }
  }

  private handleFatal(error: unknown): void {
    const fatal = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Inference worker stopped: ${fatal.message}`, fatal.stack);
    this.mailbox.close();
    for (const listener of this.fatalListeners) {
      listener(fatal);
    }
  }
}
