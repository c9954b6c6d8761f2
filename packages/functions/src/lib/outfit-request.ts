import type {
  GarmentSlot,
  OutfitColor,
  OutfitContext,
  OutfitEvaluateRequest,
  OutfitStyles,
  RGB,
  RuleConfigureRequest,
} from "outfit-harmony-shared";
import { isRgb } from "./color/palette";

const SLOTS: readonly GarmentSlot[] = ["top", "bottom", "shoes"];
const MAX_OUTFIT_COLORS = 64;

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseRgb(value: unknown, field: string): RGB {
  if (!isRgb(value)) {
    throw new RequestValidationError(`${field} must be an array of three integers between 0 and 255`);
  }
  return [value[0], value[1], value[2]];
}

function parseOutfitColor(value: unknown, field: string): OutfitColor {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      throw new RequestValidationError(`${field} must not be an empty string`);
    }
    return trimmed;
  }
  return parseRgb(value, field);
}

function parseOutfitColors(value: unknown, field: string): OutfitColor[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${field} must be an array`);
  }
  if (value.length > MAX_OUTFIT_COLORS) {
    throw new RequestValidationError(`${field} accepts at most ${MAX_OUTFIT_COLORS} colors`);
  }
  return value.map((color, index) => parseOutfitColor(color, `${field}[${index}]`));
}

/** Keeps the top/bottom/shoes slots; other keys are ignored. */
export function parseStyles(value: unknown): OutfitStyles | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    throw new RequestValidationError("styles must be an object");
  }

  const styles: OutfitStyles = {};
  for (const slot of SLOTS) {
    const label = value[slot];
    if (label === undefined) continue;
    if (label !== null && typeof label !== "string") {
      throw new RequestValidationError(`styles.${slot} must be a string or null`);
    }
    styles[slot] = label === null ? null : label.trim();
  }
  return styles;
}

export function parseContext(value: unknown): OutfitContext | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    throw new RequestValidationError("context must be an object");
  }
  if (value.type !== undefined && typeof value.type !== "string") {
    throw new RequestValidationError("context.type must be a string");
  }
  return { ...value };
}

export function parseEvaluateRequest(body: unknown): OutfitEvaluateRequest {
  if (!isPlainObject(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }
  return {
    colors: parseOutfitColors(body.colors, "colors"),
    styles: parseStyles(body.styles),
    context: parseContext(body.context),
    topColors: parseOutfitColors(body.topColors, "topColors"),
    bottomColors: parseOutfitColors(body.bottomColors, "bottomColors"),
  };
}

export function parseClassifyRequest(body: unknown): RGB {
  if (!isPlainObject(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }
  return parseRgb(body.rgb, "rgb");
}

export function parseComboRequest(body: unknown): RGB[] {
  if (!isPlainObject(body) || !Array.isArray(body.colors)) {
    throw new RequestValidationError("colors must be an array of RGB triples");
  }
  if (body.colors.length > MAX_OUTFIT_COLORS) {
    throw new RequestValidationError(`colors accepts at most ${MAX_OUTFIT_COLORS} colors`);
  }
  return body.colors.map((color: unknown, index: number) => parseRgb(color, `colors[${index}]`));
}

export function parseRuleConfigureRequest(body: unknown): RuleConfigureRequest {
  if (!isPlainObject(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }

  const configuration: RuleConfigureRequest = {};
  if (body.weight !== undefined) {
    if (typeof body.weight !== "number" || !Number.isFinite(body.weight) || body.weight <= 0) {
      throw new RequestValidationError("weight must be a positive number");
    }
    configuration.weight = body.weight;
  }
  if (body.enabled !== undefined) {
    if (typeof body.enabled !== "boolean") {
      throw new RequestValidationError("enabled must be a boolean");
    }
    configuration.enabled = body.enabled;
  }
  if (configuration.weight === undefined && configuration.enabled === undefined) {
    throw new RequestValidationError("Provide weight and/or enabled");
  }
  return configuration;
}

/** Clamped like other numeric query parameters; missing or non-numeric values fall back. */
export function parseColorCount(raw: string | null, fallback: number, max: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(1, value));
}

/** Multipart text fields carry JSON; an absent or blank field reads as undefined. */
export function parseJsonField(raw: string | null, field: string): unknown {
  if (raw === null || !raw.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestValidationError(`${field} must be valid JSON`);
  }
}
