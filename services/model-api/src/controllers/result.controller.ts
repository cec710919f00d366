import { Controller, Get, Inject } from "@nestjs/common";

import { toResultResponse, type ResultResponseDto } from "../dto/result-response.dto.js";
import type { PipelineState } from "../pipeline/pipeline.state.js";
import { PIPELINE_STATE } from "../tokens.js";

@Controller("result")
export class ResultController {
  constructor(@Inject(PIPELINE_STATE) private readonly pipeline: PipelineState) {}

  @Get()
  getResult(): ResultResponseDto {
    return toResultResponse(this.pipeline.result());
  }
}
