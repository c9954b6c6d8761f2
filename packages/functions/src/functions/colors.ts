import { app, HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import type { ColorExtractResponse } from "outfit-harmony-shared";
import { classifyColorType } from "../lib/color/classifier";
import { evaluateColorCombo } from "../lib/color/combo-scorer";
import { declaresBodyOver, jsonError, readJsonBody, toErrorResponse, withCors } from "../lib/http";
import { analyzeImageColors } from "../lib/image-analysis";
import { parseClassifyRequest, parseColorCount, parseComboRequest } from "../lib/outfit-request";
import { DEFAULT_COLOR_COUNT, MAX_COLOR_COUNT, MAX_IMAGE_BYTES } from "../lib/settings";

/**
 * POST /api/colors/extract?k=<n>
 *
 * Body is the raw encoded image. Returns up to k dominant colors, largest
 * share first, each with its palette name and tone.
 */
async function extractColors(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("POST /api/colors/extract");

  if (declaresBodyOver(request, MAX_IMAGE_BYTES)) {
    return jsonError(413, `Image exceeds ${MAX_IMAGE_BYTES} bytes`);
  }

  try {
    const image = Buffer.from(await request.arrayBuffer());
    if (image.length === 0) {
      return jsonError(400, "Request body must contain an image");
    }
    if (image.length > MAX_IMAGE_BYTES) {
      return jsonError(413, `Image exceeds ${MAX_IMAGE_BYTES} bytes`);
    }

    const k = parseColorCount(new URL(request.url).searchParams.get("k"), DEFAULT_COLOR_COUNT, MAX_COLOR_COUNT);
    const colors = await analyzeImageColors(image, k);
    context.log(`Extracted ${colors.length} colors (k=${k}, ${image.length} bytes)`);

    return { status: 200, jsonBody: { colors, k } satisfies ColorExtractResponse };
  } catch (error) {
    return toErrorResponse(error, context, "extract colors");
  }
}

/** POST /api/colors/classify  { rgb: [r, g, b] } */
async function classifyColor(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("POST /api/colors/classify");

  try {
    const rgb = parseClassifyRequest(await readJsonBody(request));
    return { status: 200, jsonBody: classifyColorType(rgb) };
  } catch (error) {
    return toErrorResponse(error, context, "classify color");
  }
}

/** POST /api/colors/combo  { colors: [[r, g, b], ...] } */
async function scoreColorCombo(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("POST /api/colors/combo");

  try {
    const colors = parseComboRequest(await readJsonBody(request));
    return { status: 200, jsonBody: evaluateColorCombo(colors) };
  } catch (error) {
    return toErrorResponse(error, context, "score color combination");
  }
}

app.http("colors-extract", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "colors/extract",
  handler: withCors(extractColors),
});

app.http("colors-classify", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "colors/classify",
  handler: withCors(classifyColor),
});

app.http("colors-combo", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "colors/combo",
  handler: withCors(scoreColorCombo),
});
