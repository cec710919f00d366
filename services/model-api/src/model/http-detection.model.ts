import { Logger } from "@nestjs/common";
import fetch from "node-fetch";
import { z } from "zod";

import type { ModelSettings } from "../config.js";
import { FatalModelError, ModelError } from "../errors.js";
import { encodePng } from "../imaging/codec.js";
import type { DecodedImage, Detection } from "../types.js";
import type { DetectionModel } from "./detection-model.js";

const loadResponseSchema = z.object({
  model: z.string(),
  classes: z.array(z.string()),
});

const bboxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .refine(([x1, y1, x2, y2]) => x1 < x2 && y1 < y2, { message: "bbox must satisfy x1<x2 and y1<y2" });

const inferResponseSchema = z.object({
  detections: z.array(
    z.object({
      class_id: z.number().int().nonnegative(),
      class_name: z.string().optional(),
      confidence: z.number().min(0).max(1),
      bbox: bboxSchema,
    }),
  ),
});

const errorBodySchema = z.object({
  error: z.string(),
  fatal: z.boolean().optional(),
});

/**
 * Adapter for a remote inference engine that keeps one model resident.
 * Callers are expected to serialize access (see ExclusiveModel).
 */
export class HttpDetectionModel implements DetectionModel {
  private readonly logger = new Logger(HttpDetectionModel.name);
  private classes: string[] | undefined;
  private warmupPng: Buffer | undefined;

  constructor(
    private readonly settings: ModelSettings,
    private readonly warmupImage: DecodedImage,
  ) {}

  async load(): Promise<void> {
    const json = await this.post("load", { model: this.settings.name });
    const parsed = loadResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new FatalModelError(`invalid load response: ${parsed.error.message}`);
    }
    this.classes = parsed.data.classes;
    this.logger.log(`Loaded ${parsed.data.model} with ${parsed.data.classes.length} classes`);
  }

  async warmup(): Promise<Detection[]> {
    if (!this.warmupPng) {
      this.warmupPng = await encodePng(this.warmupImage);
    }
    return this.detect(this.warmupPng, this.warmupImage);
  }

  async infer(image: DecodedImage): Promise<Detection[]> {
    return this.detect(await encodePng(image), image);
  }

  private async detect(png: Buffer, image: DecodedImage): Promise<Detection[]> {
    const classes = this.classes;
    if (!classes) {
      throw new ModelError("model is not loaded");
    }
    const json = await this.post("infer", {
      model: this.settings.name,
      image: png.toString("base64"),
      width: image.width,
      height: image.height,
    });
    const parsed = inferResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ModelError(`invalid inference response: ${parsed.error.message}`);
    }
    return parsed.data.detections.map((item) => {
      const className = item.class_name ?? classes[item.class_id];
      if (className === undefined) {
        throw new ModelError(`unknown class id ${item.class_id}`);
      }
      return { className, confidence: item.confidence, bbox: item.bbox };
    });
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const base = this.settings.baseUrl.endsWith("/") ? this.settings.baseUrl : `${this.settings.baseUrl}/`;
    const url = new URL(path, base).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        const failure = parseErrorBody(text);
        const message = `inference engine error: ${response.status} ${failure?.error ?? text}`;
        if (failure?.fatal) {
          throw new FatalModelError(message, response.status);
        }
        throw new ModelError(message, response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof ModelError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new ModelError(`inference engine timed out after ${this.settings.timeoutMs}ms`);
      }
      throw new ModelError(`inference engine unreachable: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

function parseErrorBody(text: string): z.infer<typeof errorBodySchema> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = errorBodySchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}
