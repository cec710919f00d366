export type BoundingBox = [x1: number, y1: number, x2: number, y2: number];

/** Raw interleaved RGB pixels. Treated as immutable once decoded. */
export interface DecodedImage {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export interface Detection {
  className: string;
  confidence: number;
  bbox: BoundingBox;
}

export interface DetectionBatch {
  /** Sorted by confidence, highest first. */
  detections: readonly Detection[];
  /** Unix seconds at completion. */
  timestamp: number;
}

export type PredictionResult =
  | { kind: "pending" }
  | { kind: "empty"; timestamp: number }
  | { kind: "detected"; timestamp: number; detections: readonly Detection[] };
