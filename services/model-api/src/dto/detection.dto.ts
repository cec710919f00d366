import type { BoundingBox, Detection } from "../types.js";

export class DetectionDto {
  class_name!: string;
  confidence!: number;
  bbox!: BoundingBox;
}

export class WarmupDetectionDto {
  class_name!: string;
  confidence!: number;
}

export function toDetectionDto(detection: Detection): DetectionDto {
  return {
    class_name: detection.className,
    confidence: detection.confidence,
    bbox: [...detection.bbox],
  };
}
