function readInt(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    console.warn(`[settings] ${name}="${raw}" is not a number; using ${fallback}`);
    return fallback;
  }
  return Math.min(max, Math.max(min, value));
}

export const MAX_COLOR_COUNT = 10;

/** k used for dominant-color extraction when the request does not set one */
export const DEFAULT_COLOR_COUNT = readInt("ANALYSIS_COLOR_COUNT", 5, 1, MAX_COLOR_COUNT);

export const MAX_IMAGE_BYTES = readInt("ANALYSIS_MAX_IMAGE_BYTES", 16 * 1024 * 1024, 1024, 64 * 1024 * 1024);

/** Images are scaled down so their longer side is at most this many pixels before clustering */
export const MAX_IMAGE_SIDE = readInt("ANALYSIS_MAX_IMAGE_SIDE", 256, 16, 2048);

export const EXTRACTION_CACHE_TTL_SECONDS = readInt("EXTRACTION_CACHE_TTL_SECONDS", 86400, 60, 30 * 86400);

export const RULE_OVERRIDES = process.env.RULE_OVERRIDES?.trim() || undefined;
