import type { DecodedImage, Detection } from "../types.js";

/**
 * Opaque, stateful detector. Must be loaded once before use and must never be
 * called by more than one caller at a time.
 */
export interface DetectionModel {
  load(): Promise<void>;
  /** Runs the model on its fixed built-in warmup image. */
  warmup(): Promise<Detection[]>;
  infer(image: DecodedImage): Promise<Detection[]>;
}
