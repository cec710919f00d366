import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";

import { PREDICT_ACCEPTED, type PredictResponseDto } from "../dto/predict-response.dto.js";
import { DecodeError } from "../errors.js";
import { decodeImage } from "../imaging/codec.js";
import type { PipelineState } from "../pipeline/pipeline.state.js";
import { PIPELINE_STATE } from "../tokens.js";

@Controller("predict")
export class PredictController {
  constructor(@Inject(PIPELINE_STATE) private readonly pipeline: PipelineState) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("image"))
  async predict(@UploadedFile() file: Express.Multer.File | undefined): Promise<PredictResponseDto> {
    if (!file) {
      throw new BadRequestException("multipart field 'image' is required");
    }
    try {
      const image = await decodeImage(file.buffer);
      this.pipeline.submit(image);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }
    return { status: PREDICT_ACCEPTED };
  }
}
