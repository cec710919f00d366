import type { Detection, DetectionBatch, PredictionResult } from "../types.js";

export type Clock = () => number;

export const unixSeconds: Clock = () => Date.now() / 1000;

export function sortByConfidence(detections: readonly Detection[]): Detection[] {
  // Array#sort is stable, so equal confidences keep model order.
  return [...detections].sort((a, b) => b.confidence - a.confidence);
}

export function buildBatch(detections: readonly Detection[], clock: Clock = unixSeconds): DetectionBatch {
  const sorted = sortByConfidence(detections).map((detection) =>
    Object.freeze<Detection>({ ...detection, bbox: [...detection.bbox] }),
  );
  return Object.freeze({
    detections: Object.freeze(sorted),
    timestamp: clock(),
  });
}

export function toPredictionResult(batch: DetectionBatch | undefined): PredictionResult {
  if (!batch) {
    return { kind: "pending" };
  }
  if (batch.detections.length === 0) {
    return { kind: "empty", timestamp: batch.timestamp };
  }
  return { kind: "detected", timestamp: batch.timestamp, detections: batch.detections };
}
