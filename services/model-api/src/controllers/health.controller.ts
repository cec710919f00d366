import { Controller, Get, Inject, Logger, ServiceUnavailableException } from "@nestjs/common";

import type { HealthResponseDto } from "../dto/health-response.dto.js";
import type { PipelineState } from "../pipeline/pipeline.state.js";
import { PIPELINE_STATE } from "../tokens.js";

@Controller()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@Inject(PIPELINE_STATE) private readonly pipeline: PipelineState) {}

  /** Re-runs the warmup image through the model on every call. */
  @Get()
  async health(): Promise<HealthResponseDto> {
    try {
      const detections = await this.pipeline.warmup();
      return {
        detections: detections.map((detection) => ({
          class_name: detection.className,
          confidence: detection.confidence,
        })),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Warmup check failed: ${message}`);
      throw new ServiceUnavailableException(`model warmup failed: ${message}`);
    }
  }
}
