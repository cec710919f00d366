import type { DetectionModel } from "../model/detection-model.js";

/**
 * Serializes every call into the detection model. The worker and the health
 * check both go through here, so the adapter never has two callers at once.
 */
export class ExclusiveModel {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly model: DetectionModel) {}

  run<T>(task: (model: DetectionModel) => Promise<T>): Promise<T> {
    const next = this.tail.then(() => task(this.model));
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
