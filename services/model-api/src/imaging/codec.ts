import bmp from "bmp-js";
import sharp from "sharp";

import { DecodeError } from "../errors.js";
import type { DecodedImage } from "../types.js";

const SHARP_FORMATS: ReadonlySet<string> = new Set(["jpeg", "png", "tiff"]);

function isBmp(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeBmp(buffer: Buffer): DecodedImage {
  let decoded: ReturnType<typeof bmp.decode>;
  try {
    decoded = bmp.decode(buffer);
  } catch (error) {
    throw new DecodeError(`invalid BMP payload: ${describe(error)}`);
  }
  const { width, height } = decoded;
  if (width <= 0 || height <= 0) {
    throw new DecodeError("invalid BMP payload: empty image");
  }
  const data = Buffer.alloc(width * height * 3);
  for (let pixel = 0; pixel < width * height; pixel += 1) {
    // bmp-js yields ABGR
    data[pixel * 3] = decoded.data[pixel * 4 + 3];
    data[pixel * 3 + 1] = decoded.data[pixel * 4 + 2];
    data[pixel * 3 + 2] = decoded.data[pixel * 4 + 1];
  }
  return { width, height, channels: 3, data };
}

async function decodeWithSharp(buffer: Buffer): Promise<DecodedImage> {
  let format: string | undefined;
  try {
    format = (await sharp(buffer).metadata()).format;
  } catch (error) {
    throw new DecodeError(`unrecognised image payload: ${describe(error)}`);
  }
  if (!format || !SHARP_FORMATS.has(format)) {
    throw new DecodeError(`unsupported image format: ${format ?? "unknown"}`);
  }

  try {
    const { data, info } = await sharp(buffer, { failOn: "error" })
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
      throw new DecodeError(`expected 3 colour channels, got ${info.channels}`);
    }
    return { width: info.width, height: info.height, channels: 3, data };
  } catch (error) {
    if (error instanceof DecodeError) {
      throw error;
    }
    throw new DecodeError(`corrupt ${format} payload: ${describe(error)}`);
  }
}

/** Decodes a JPEG, PNG, TIFF or BMP upload into raw RGB pixels. */
export async function decodeImage(buffer: Buffer): Promise<DecodedImage> {
  if (buffer.length === 0) {
    throw new DecodeError("empty image payload");
  }
  return isBmp(buffer) ? decodeBmp(buffer) : decodeWithSharp(buffer);
}

export async function encodePng(image: DecodedImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .png()
    .toBuffer();
}
