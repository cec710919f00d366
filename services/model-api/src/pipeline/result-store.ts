import type { DetectionBatch } from "../types.js";

export class ResultStore {
  private latest: DetectionBatch | undefined;

  publish(batch: DetectionBatch): void {
    this.latest = Object.isFrozen(batch) ? batch : Object.freeze({ ...batch });
  }

  snapshot(): DetectionBatch | undefined {
    return this.latest;
  }
}
