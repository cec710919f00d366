import { z } from "zod";

export const appConfigSchema = z.object({
  port: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().positive(),
  maxUploadBytes: z.number().int().positive(),
  model: z.object({
    baseUrl: z.string().url(),
    name: z.string().min(1),
    timeoutMs: z.number().int().positive(),
  }),
  warmup: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    seed: z.number().int().nonnegative(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ModelSettings = AppConfig["model"];
export type WarmupSettings = AppConfig["warmup"];

type Env = Record<string, string | undefined>;

const numberFrom = (value: string | undefined, fallback: number): number =>
  value === undefined || value === "" ? fallback : Number(value);

export function loadConfig(env: Env = process.env): AppConfig {
  return appConfigSchema.parse({
    port: numberFrom(env.PORT, 8000),
    requestTimeoutMs: numberFrom(env.REQUEST_TIMEOUT_MS, 30_000),
    maxUploadBytes: numberFrom(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
    model: {
      baseUrl: env.INFERENCE_BASE_URL ?? "http://localhost:9000",
      name: env.MODEL_NAME ?? "yolo11/best.engine",
      timeoutMs: numberFrom(env.INFERENCE_TIMEOUT_MS, 10_000),
    },
    warmup: {
      width: numberFrom(env.WARMUP_WIDTH, 256),
      height: numberFrom(env.WARMUP_HEIGHT, 256),
      seed: numberFrom(env.WARMUP_SEED, 1234),
    },
  });
}
