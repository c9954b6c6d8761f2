import type { HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import { ImageDecodeError } from "./color/extractor";
import { RequestValidationError } from "./outfit-request";
import { trackException } from "./telemetry";

type HttpHandler = (request: HttpRequest, context: InvocationContext) => Promise<HttpResponseInit>;

const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];
const allowedOrigins = (process.env.CORS_ALLOWED_ORIGINS ?? DEFAULT_ALLOWED_ORIGINS.join(","))
  .split(",")
  .map((origin) => origin.trim())
  .filter(Boolean);

const ALLOW_HEADERS = process.env.CORS_ALLOWED_HEADERS ?? "Content-Type, x-functions-key";
const ALLOW_METHODS = process.env.CORS_ALLOWED_METHODS ?? "GET,POST,PATCH,OPTIONS";

/** Exact origins, `*` wildcards inside a pattern, or a bare `*` for any origin. */
export function originMatches(origin: string, pattern: string): boolean {
  if (pattern === "*") return true;
  if (!pattern.includes("*")) return origin === pattern;
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^${escaped.replace(/\*/g, ".*")}$`, "i").test(origin);
}

function corsHeaders(origin: string | null, base?: HttpResponseInit["headers"]): Headers | null {
  const pattern = origin ? allowedOrigins.find((candidate) => originMatches(origin, candidate)) : undefined;
  if (!origin || pattern === undefined) return null;

  // The API is keyed, not cookie-authenticated, so credentials are never allowed.
  const headers = new Headers(base ?? {});
  headers.set("Access-Control-Allow-Origin", pattern === "*" ? "*" : origin);
  headers.set("Access-Control-Allow-Headers", ALLOW_HEADERS);
  headers.set("Access-Control-Allow-Methods", ALLOW_METHODS);
  headers.set("Vary", "Origin");
  return headers;
}

export function withCors(handler: HttpHandler): HttpHandler {
  return async (request, context) => {
    const origin = request.headers.get("origin");

    if (request.method?.toUpperCase() === "OPTIONS") {
      const headers = corsHeaders(origin);
      return headers ? { status: 204, headers } : { status: 204 };
    }

    const response = await handler(request, context);
    const headers = corsHeaders(origin, response.headers);
    return headers ? { ...response, headers } : response;
  };
}

/**
 * True when the declared Content-Length is over `limit`, so the body can be
 * refused before it is buffered. A missing or malformed header reads as false;
 * callers still check the buffered size.
 */
export function declaresBodyOver(request: HttpRequest, limit: number): boolean {
  const declared = Number.parseInt(request.headers.get("content-length") ?? "", 10);
  return Number.isFinite(declared) && declared > limit;
}

/** Lowercased media type without parameters, or "" when absent. */
export function mediaTypeOf(request: HttpRequest): string {
  const [mediaType] = (request.headers.get("content-type") ?? "").split(";");
  return mediaType.trim().toLowerCase();
}

export function jsonError(status: number, error: string, details?: string): HttpResponseInit {
  return { status, jsonBody: details ? { error, details } : { error } };
}

/** Parses the request body as JSON; an empty body reads as `{}`. */
export async function readJsonBody(request: HttpRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestValidationError("Request body is not valid JSON");
  }
}

/**
 * Maps the typed errors of the analysis core onto status codes. Anything
 * unexpected is logged and tracked, and becomes a 500.
 */
export function toErrorResponse(
  error: unknown,
  context: InvocationContext,
  operation: string
): HttpResponseInit {
  if (error instanceof RequestValidationError) {
    return jsonError(400, error.message);
  }
  if (error instanceof ImageDecodeError) {
    return jsonError(422, "Unable to read image", error.message);
  }

  context.error(`[${operation}] Unexpected error:`, error);
  trackException(error, { operation });
  return jsonError(500, `Failed to ${operation}`);
}

export type { HttpHandler };
