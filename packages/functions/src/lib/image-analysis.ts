import type { ClassifiedDominantColor, DominantColor } from "outfit-harmony-shared";
import { extractionCacheKey, cacheGetJson, cacheSetJson } from "./cache";
import { classifyColorType } from "./color/classifier";
import { extractDominantColorsFromImage } from "./color/extractor";
import { isRgb } from "./color/palette";
import { EXTRACTION_CACHE_TTL_SECONDS, MAX_IMAGE_SIDE } from "./settings";
import { trackMetric } from "./telemetry";

function isDominantColorList(value: unknown): value is DominantColor[] {
  return (
    Array.isArray(value) &&
    value.every(
      (entry) =>
        typeof entry === "object" &&
        entry !== null &&
        isRgb(entry.rgb) &&
        typeof entry.percentage === "number"
    )
  );
}

/** Rounds the percentage to two decimals and attaches the palette classification. */
export function classifyDominantColors(colors: DominantColor[]): ClassifiedDominantColor[] {
  return colors.map(({ rgb, percentage }) => ({
    rgb,
    percentage: Math.round(percentage * 100) / 100,
    ...classifyColorType(rgb),
  }));
}

/**
 * Dominant colors of an encoded image, served from the extraction cache
 * when the same bytes were analyzed at the same k before.
 */
export async function analyzeImageColors(image: Buffer, k: number): Promise<ClassifiedDominantColor[]> {
  const cacheKey = extractionCacheKey(image, k, MAX_IMAGE_SIDE);
  const cached = await cacheGetJson(cacheKey, isDominantColorList);
  if (cached) {
    return classifyDominantColors(cached);
  }

  const started = Date.now();
  const colors = await extractDominantColorsFromImage(image, k, MAX_IMAGE_SIDE);
  trackMetric("colors.extract.durationMs", Date.now() - started, { k, bytes: image.length });

  await cacheSetJson(cacheKey, colors, EXTRACTION_CACHE_TTL_SECONDS);
  return classifyDominantColors(colors);
}
