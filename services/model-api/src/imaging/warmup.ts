import type { WarmupSettings } from "../config.js";
import type { DecodedImage } from "../types.js";

function seededRandom(seed: number): () => number {
  let value = seed % 2147483647;
  if (value <= 0) {
    value += 2147483646;
  }
  return () => {
    value = (value * 16807) % 2147483647;
    return (value - 1) / 2147483646;
  };
}

/** Fixed RGB noise frame; the same settings always give the same pixels. */
export function createWarmupImage(settings: WarmupSettings): DecodedImage {
  const random = seededRandom(settings.seed);
  const data = Buffer.alloc(settings.width * settings.height * 3);
  for (let i = 0; i < data.length; i += 1) {
    data[i] = Math.floor(random() * 256);
  }
  return { width: settings.width, height: settings.height, channels: 3, data };
}
