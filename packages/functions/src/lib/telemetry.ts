import * as appInsights from "applicationinsights";
import type { EvaluationReport } from "outfit-harmony-shared";

const connectionString = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING?.trim();

let client: appInsights.TelemetryClient | null = null;

if (connectionString) {
  appInsights
    .setup(connectionString)
    // The Functions host already records requests.
    .setAutoCollectRequests(false)
    .setAutoCollectDependencies(true)
    .setAutoCollectExceptions(false)
    .setAutoCollectConsole(false)
    .start();

  client = appInsights.defaultClient;
}

type TelemetryProperties = Record<string, string | number | boolean | null | undefined>;

function toProperties(properties?: TelemetryProperties): Record<string, string> | undefined {
  if (!properties) return undefined;

  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value === null || value === undefined) continue;
    normalized[key] = String(value);
  }
  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

export function trackEvent(name: string, properties?: TelemetryProperties): void {
  try {
    client?.trackEvent({ name, properties: toProperties(properties) });
  } catch (error) {
    console.warn(`[telemetry] trackEvent(${name}) failed:`, error);
  }
}

export function trackMetric(name: string, value: number, properties?: TelemetryProperties): void {
  try {
    client?.trackMetric({ name, value, properties: toProperties(properties) });
  } catch (error) {
    console.warn(`[telemetry] trackMetric(${name}) failed:`, error);
  }
}

export function trackException(error: unknown, properties?: TelemetryProperties): void {
  try {
    const exception = error instanceof Error ? error : new Error(String(error));
    client?.trackException({ exception, properties: toProperties(properties) });
  } catch (trackingError) {
    console.warn("[telemetry] trackException failed:", trackingError);
  }
}

/** Score plus error/warning counts for one outfit evaluation. */
export function trackOutfitEvaluation(report: EvaluationReport, source: "evaluate" | "analyze"): void {
  trackMetric("outfit.score", report.score, { source, passed: report.passed });
  trackEvent("outfit.evaluated", {
    source,
    passed: report.passed,
    rules: report.summary.totalRules,
    errors: report.summary.errors,
    warnings: report.summary.warnings,
  });
}
