import { app, HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import type { OutfitAnalyzeResponse, OutfitContext, OutfitStyles, RGB } from "outfit-harmony-shared";
import { ruleEvaluator } from "../lib/app-rules";
import { evaluateColorCombo } from "../lib/color/combo-scorer";
import { declaresBodyOver, jsonError, mediaTypeOf, readJsonBody, toErrorResponse, withCors } from "../lib/http";
import { analyzeImageColors } from "../lib/image-analysis";
import {
  parseColorCount,
  parseContext,
  parseEvaluateRequest,
  parseJsonField,
  parseStyles,
  RequestValidationError,
} from "../lib/outfit-request";
import { getContextRecommendation } from "../lib/recommendations";
import { DEFAULT_COLOR_COUNT, MAX_COLOR_COUNT, MAX_IMAGE_BYTES } from "../lib/settings";
import { trackOutfitEvaluation } from "../lib/telemetry";

type RequestForm = Awaited<ReturnType<HttpRequest["formData"]>>;

interface AnalyzeInput {
  image: Buffer;
  styles?: OutfitStyles;
  context?: OutfitContext;
}

function textField(form: RequestForm, name: string): string | null {
  const value = form.get(name);
  return typeof value === "string" ? value : null;
}

/**
 * Accepts multipart/form-data (an `image` file plus optional `styles` and
 * `context` JSON fields) or a raw image body with `?context=<type>`.
 */
async function readAnalyzeInput(request: HttpRequest): Promise<AnalyzeInput> {
  const mediaType = mediaTypeOf(request);

  if (mediaType === "multipart/form-data") {
    const form = await request.formData();
    const file = form.get("image");
    if (file === null || typeof file === "string") {
      throw new RequestValidationError("Form field 'image' must be a file");
    }
    return {
      image: Buffer.from(await file.arrayBuffer()),
      styles: parseStyles(parseJsonField(textField(form, "styles"), "styles")),
      context: parseContext(parseJsonField(textField(form, "context"), "context")),
    };
  }

  if (mediaType.startsWith("image/")) {
    const contextType = new URL(request.url).searchParams.get("context")?.trim();
    return {
      image: Buffer.from(await request.arrayBuffer()),
      context: contextType ? { type: contextType } : undefined,
    };
  }

  throw new RequestValidationError("Expected multipart/form-data or an image/* body");
}

/**
 * POST /api/outfits/analyze?k=<n>
 *
 * Full pipeline for one outfit photo: dominant colors, color-combination
 * score, and the rule report over those colors plus any styles/context sent
 * with the image.
 */
async function analyzeOutfit(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("POST /api/outfits/analyze");

  // Multipart overhead counts against the limit too; the image alone is checked after parsing.
  if (declaresBodyOver(request, MAX_IMAGE_BYTES)) {
    return jsonError(413, `Image exceeds ${MAX_IMAGE_BYTES} bytes`);
  }

  try {
    const input = await readAnalyzeInput(request);
    if (input.image.length === 0) {
      return jsonError(400, "Image is empty");
    }
    if (input.image.length > MAX_IMAGE_BYTES) {
      return jsonError(413, `Image exceeds ${MAX_IMAGE_BYTES} bytes`);
    }

    const k = parseColorCount(new URL(request.url).searchParams.get("k"), DEFAULT_COLOR_COUNT, MAX_COLOR_COUNT);
    const colors = await analyzeImageColors(input.image, k);
    const rgbs: RGB[] = colors.map((color) => color.rgb);
    const combo = evaluateColorCombo(rgbs);
    const ruleEvaluation = ruleEvaluator.evaluateOutfit({
      colors: rgbs,
      styles: input.styles,
      context: input.context,
    });
    trackOutfitEvaluation(ruleEvaluation, "analyze");

    const response: OutfitAnalyzeResponse = {
      colors,
      colorEvaluation: { score: combo.score, suggestions: combo.suggestions },
      styles: input.styles ?? {},
      context: input.context ?? {},
      ruleEvaluation,
      analyzedAt: new Date().toISOString(),
    };
    return { status: 200, jsonBody: response };
  } catch (error) {
    return toErrorResponse(error, context, "analyze outfit");
  }
}

/** POST /api/outfits/evaluate  { colors?, styles?, context?, topColors?, bottomColors? } */
async function evaluateOutfit(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("POST /api/outfits/evaluate");

  try {
    const input = parseEvaluateRequest(await readJsonBody(request));
    const report = ruleEvaluator.evaluateOutfit(input);
    trackOutfitEvaluation(report, "evaluate");
    return { status: 200, jsonBody: report };
  } catch (error) {
    return toErrorResponse(error, context, "evaluate outfit");
  }
}

/** GET /api/outfits/recommendations?context=<type> */
async function getRecommendations(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("GET /api/outfits/recommendations");

  const contextType = new URL(request.url).searchParams.get("context");
  return { status: 200, jsonBody: getContextRecommendation(contextType) };
}

app.http("outfits-analyze", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "outfits/analyze",
  handler: withCors(analyzeOutfit),
});

app.http("outfits-evaluate", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "outfits/evaluate",
  handler: withCors(evaluateOutfit),
});

app.http("outfits-recommendations", {
  methods: ["GET", "OPTIONS"],
  authLevel: "anonymous",
  route: "outfits/recommendations",
  handler: withCors(getRecommendations),
});
