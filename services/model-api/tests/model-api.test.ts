import "reflect-metadata";

import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import sharp from "sharp";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AppModule } from "../src/app.module.js";
import type { AppConfig } from "../src/config.js";
import { ModelError } from "../src/errors.js";
import type { PipelineState } from "../src/pipeline/pipeline.state.js";
import { APP_CONFIG, DETECTION_MODEL, PIPELINE_STATE } from "../src/tokens.js";
import { FakeDetectionModel, detection } from "./support/fake-model.js";

const config: AppConfig = {
  port: 0,
  requestTimeoutMs: 5000,
  maxUploadBytes: 64 * 1024,
  model: { baseUrl: "http://engine.test", name: "test-model", timeoutMs: 1000 },
  warmup: { width: 8, height: 8, seed: 1 },
};

async function jpegFrame(): Promise<Buffer> {
  return sharp({ create: { width: 32, height: 24, channels: 3, background: "#808080" } }).jpeg().toBuffer();
}

describe("Model API", () => {
  let app: INestApplication;
  let model: FakeDetectionModel;
  let pipeline: PipelineState;

  beforeEach(async () => {
    model = new FakeDetectionModel(() => [], [detection("noise", 0.1), detection("blob", 0.6)]);

    const module: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(APP_CONFIG)
      .useValue(config)
      .overrideProvider(DETECTION_MODEL)
      .useValue(model)
      .compile();

    app = module.createNestApplication();
    await app.init();
    pipeline = app.get<PipelineState>(PIPELINE_STATE);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (app) {
      await app.close();
    }
  });

  it("warms the model before serving and re-runs warmup on the root route", async () => {
    expect(model.loadCalls).toBe(1);
    expect(model.warmupCalls).toBe(1);

    const response = await request(app.getHttpServer()).get("/").expect(200);

    expect(response.body).toEqual({
      detections: [
        { class_name: "blob", confidence: 0.6 },
        { class_name: "noise", confidence: 0.1 },
      ],
    });
    expect(model.warmupCalls).toBe(2);
    expect(model.inferred).toHaveLength(0);
  });

  it("answers 503 when the warmup check fails", async () => {
    vi.spyOn(model, "warmup").mockRejectedValue(new ModelError("engine offline"));

    const response = await request(app.getHttpServer()).get("/").expect(503);

    expect(response.body.message).toBe("model warmup failed: engine offline");
  });

  it("reports that no prediction exists yet", async () => {
    const response = await request(app.getHttpServer()).get("/result/").expect(200);

    expect(response.body).toEqual({
      detections: [],
      timestamp: null,
      message: "No prediction available yet",
    });
  });

  it("accepts a JPEG and later serves its detections", async () => {
    model.respondWith(() => [detection("person", 0.95, [100, 50, 200, 300])]);

    const accepted = await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", await jpegFrame(), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(200);
    expect(accepted.body).toEqual({ status: "Image received for prediction" });

    await vi.waitFor(() => expect(pipeline.worker.processed).toBe(1));
    const result = await request(app.getHttpServer()).get("/result/").expect(200);

    expect(result.body).toEqual({
      detections: [{ class_name: "person", confidence: 0.95, bbox: [100, 50, 200, 300] }],
      timestamp: expect.any(Number),
      total_objects: 1,
    });
    expect(model.inferred[0]).toMatchObject({ width: 32, height: 24, channels: 3 });
  });

  it("returns sorted detections with a matching count", async () => {
    model.respondWith(() => [detection("a", 0.3), detection("b", 0.9), detection("c", 0.5)]);

    await request(app.getHttpServer())
      .post("/predict")
      .attach("image", await jpegFrame(), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(200);
    await vi.waitFor(() => expect(pipeline.worker.processed).toBe(1));

    const result = await request(app.getHttpServer()).get("/result").expect(200);

    expect(result.body.detections.map((item: { confidence: number }) => item.confidence)).toEqual([0.9, 0.5, 0.3]);
    expect(result.body.total_objects).toBe(result.body.detections.length);
  });

  it("distinguishes an empty result from a missing one", async () => {
    await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", await jpegFrame(), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(200);
    await vi.waitFor(() => expect(pipeline.worker.processed).toBe(1));

    const result = await request(app.getHttpServer()).get("/result/").expect(200);

    expect(result.body).toEqual({
      detections: [],
      timestamp: pipeline.snapshot()?.timestamp,
      total_objects: 0,
      message: "No objects detected in the image",
    });
    expect(typeof result.body.timestamp).toBe("number");
  });

  it("keeps the last result when a later inference fails", async () => {
    model.respondWith(() => [detection("person", 0.8, [1, 1, 5, 5])]);
    await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", await jpegFrame(), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(200);
    await vi.waitFor(() => expect(pipeline.worker.processed).toBe(1));
    const before = await request(app.getHttpServer()).get("/result/").expect(200);

    model.respondWith(() => {
      throw new ModelError("corrupt frame");
    });
    await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", await jpegFrame(), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(200);
    await vi.waitFor(() => expect(pipeline.worker.failed).toBe(1));

    const after = await request(app.getHttpServer()).get("/result/").expect(200);
    expect(after.body).toEqual(before.body);
  });

  it("requires the image field", async () => {
    const response = await request(app.getHttpServer()).post("/predict/").field("frame", "nothing").expect(400);

    expect(response.body.message).toBe("multipart field 'image' is required");
  });

  it("rejects undecodable uploads without touching the pipeline", async () => {
    const response = await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", Buffer.from("not really a jpeg"), { filename: "frame.jpg", contentType: "image/jpeg" })
      .expect(422);

    expect(response.body.message).toMatch(/^unrecognised image payload/);
    expect(pipeline.mailbox.pending).toBe(false);
    expect(model.inferred).toHaveLength(0);
  });

  it("rejects uploads over the size limit", async () => {
    await request(app.getHttpServer())
      .post("/predict/")
      .attach("image", Buffer.alloc(config.maxUploadBytes + 1), { filename: "big.jpg", contentType: "image/jpeg" })
      .expect(413);
  });
});
