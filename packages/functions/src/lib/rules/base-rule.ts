import type {
  OutfitColor,
  OutfitContext,
  OutfitRecord,
  OutfitStyles,
  RuleKind,
  RuleResult,
  RuleSeverity,
} from "outfit-harmony-shared";

export interface OutfitRule {
  readonly name: string;
  readonly description: string;
  readonly kind: RuleKind;
  weight: number;
  enabled: boolean;
  evaluate(outfit: OutfitRecord): RuleResult;
}

export interface RuleOptions {
  weight?: number;
  enabled?: boolean;
}

/** A rule verdict before the owning rule stamps its weight on it */
export interface RuleVerdict {
  passed: boolean;
  score: number;
  message: string;
  suggestion?: string | null;
  severity?: RuleSeverity;
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(100, score));
}

export function assertWeight(weight: number): number {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new RangeError(`Rule weight must be a positive number, got ${weight}`);
  }
  return weight;
}

export abstract class BaseRule implements OutfitRule {
  abstract readonly kind: RuleKind;
  enabled: boolean;
  private currentWeight: number;

  protected constructor(
    readonly name: string,
    readonly description: string,
    options: RuleOptions = {}
  ) {
    this.currentWeight = assertWeight(options.weight ?? 1);
    this.enabled = options.enabled ?? true;
  }

  get weight(): number {
    return this.currentWeight;
  }

  set weight(value: number) {
    this.currentWeight = assertWeight(value);
  }

  evaluate(outfit: OutfitRecord): RuleResult {
    const verdict = this.evaluateOutfit(outfit);
    return {
      passed: verdict.passed,
      score: clampScore(verdict.score),
      message: verdict.message,
      suggestion: verdict.suggestion || null,
      severity: verdict.severity ?? "info",
      weight: this.weight,
    };
  }

  protected abstract evaluateOutfit(outfit: OutfitRecord): RuleVerdict;

  protected skipped(message: string): RuleVerdict {
    return { passed: true, score: 100, message, severity: "info" };
  }
}

/** Only runs when the outfit carries at least one color. */
export abstract class ColorRule extends BaseRule {
  readonly kind = "color";

  protected evaluateOutfit(outfit: OutfitRecord): RuleVerdict {
    if (outfit.colors.length === 0) {
      return this.skipped("No colors provided; color rule skipped");
    }
    return this.evaluateColors(outfit.colors, outfit);
  }

  protected abstract evaluateColors(colors: OutfitColor[], outfit: OutfitRecord): RuleVerdict;
}

/** Only runs when the outfit carries style labels. */
export abstract class StyleRule extends BaseRule {
  readonly kind = "style";

  protected evaluateOutfit(outfit: OutfitRecord): RuleVerdict {
    if (Object.keys(outfit.styles).length === 0) {
      return this.skipped("No styles provided; style rule skipped");
    }
    return this.evaluateStyles(outfit.styles, outfit);
  }

  protected abstract evaluateStyles(styles: OutfitStyles, outfit: OutfitRecord): RuleVerdict;
}

/** Only runs when the outfit carries a usage context. */
export abstract class ContextRule extends BaseRule {
  readonly kind = "context";

  protected evaluateOutfit(outfit: OutfitRecord): RuleVerdict {
    if (Object.keys(outfit.context).length === 0) {
      return this.skipped("No context provided; context rule skipped");
    }
    return this.evaluateContext(outfit.context, outfit);
  }

  protected abstract evaluateContext(context: OutfitContext, outfit: OutfitRecord): RuleVerdict;
}
