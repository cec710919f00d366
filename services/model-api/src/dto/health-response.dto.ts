import type { WarmupDetectionDto } from "./detection.dto.js";

export class HealthResponseDto {
  detections!: WarmupDetectionDto[];
}
