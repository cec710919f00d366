import type { PredictionResult } from "../types.js";
import { toDetectionDto, type DetectionDto } from "./detection.dto.js";

export const NO_PREDICTION_MESSAGE = "No prediction available yet";
export const NO_OBJECTS_MESSAGE = "No objects detected in the image";

export interface PendingResultDto {
  detections: [];
  timestamp: null;
  message: typeof NO_PREDICTION_MESSAGE;
}

export interface EmptyResultDto {
  detections: [];
  timestamp: number;
  total_objects: 0;
  message: typeof NO_OBJECTS_MESSAGE;
}

export interface DetectedResultDto {
  detections: DetectionDto[];
  timestamp: number;
  total_objects: number;
}

export type ResultResponseDto = PendingResultDto | EmptyResultDto | DetectedResultDto;

export function toResultResponse(result: PredictionResult): ResultResponseDto {
  switch (result.kind) {
    case "pending":
      return { detections: [], timestamp: null, message: NO_PREDICTION_MESSAGE };
    case "empty":
      return { detections: [], timestamp: result.timestamp, total_objects: 0, message: NO_OBJECTS_MESSAGE };
    case "detected": {
      const detections = result.detections.map(toDetectionDto);
      return { detections, timestamp: result.timestamp, total_objects: detections.length };
    }
  }
}
