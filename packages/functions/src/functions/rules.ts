import { app, HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import type { RuleListResponse } from "outfit-harmony-shared";
import { ruleLibrary } from "../lib/app-rules";
import { jsonError, readJsonBody, toErrorResponse, withCors } from "../lib/http";
import { parseRuleConfigureRequest } from "../lib/outfit-request";
import { describeRule } from "../lib/rules/rule-library";
import { trackEvent } from "../lib/telemetry";

/** GET /api/rules */
async function listRules(_request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  context.log("GET /api/rules");
  return { status: 200, jsonBody: { rules: ruleLibrary.describe() } satisfies RuleListResponse };
}

/**
 * PATCH /api/rules/{name}  { weight?, enabled? }
 *
 * Reconfigures the rule for this function app instance. Requires a
 * function key.
 */
async function configureRule(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
  const name = request.params.name;
  context.log(`PATCH /api/rules/${name ?? ""}`);

  if (!name) {
    return jsonError(400, "Rule name is required");
  }

  try {
    const configuration = parseRuleConfigureRequest(await readJsonBody(request));
    const rule = ruleLibrary.get(name);
    if (!rule) {
      return jsonError(404, `Unknown rule "${name}"`);
    }

    ruleLibrary.configure(name, configuration);
    trackEvent("rules.configured", { rule: name, weight: rule.weight, enabled: rule.enabled });
    context.log(`Rule ${name} now weight=${rule.weight} enabled=${rule.enabled}`);

    return { status: 200, jsonBody: describeRule(rule) };
  } catch (error) {
    return toErrorResponse(error, context, "configure rule");
  }
}

app.http("rules-list", {
  methods: ["GET", "OPTIONS"],
  authLevel: "anonymous",
  route: "rules",
  handler: withCors(listRules),
});

app.http("rules-configure", {
  methods: ["PATCH", "OPTIONS"],
  authLevel: "function",
  route: "rules/{name}",
  handler: withCors(configureRule),
});
