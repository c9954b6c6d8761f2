import type { RuleDescriptor } from "outfit-harmony-shared";
import { assertWeight, type OutfitRule } from "./base-rule";
import { ForbiddenColorComboRule, LightTopDarkBottomRule, ThreeColorRule } from "./color-rules";
import { ContextAppropriateRule } from "./context-rules";
import { StyleCoordinationRule } from "./style-rules";

export class DuplicateRuleError extends Error {
  constructor(public readonly ruleName: string) {
    super(`A rule named "${ruleName}" is already registered`);
    this.name = "DuplicateRuleError";
  }
}

export interface RuleConfiguration {
  weight?: number;
  enabled?: boolean;
}

export function createDefaultRules(): OutfitRule[] {
  return [
    new ThreeColorRule({ maxColors: 3, weight: 1.5 }),
    new LightTopDarkBottomRule({ weight: 1.2 }),
    new ForbiddenColorComboRule({ weight: 1.8 }),
    new StyleCoordinationRule({ weight: 1.5 }),
    new ContextAppropriateRule({ weight: 1.3 }),
  ];
}

/**
 * Ordered registry of outfit rules, unique by name.
 *
 * Instances are owned by the caller and may be shared between evaluators.
 * Evaluation only reads from the library; concurrent mutation while an
 * evaluation is running is the owner's responsibility to serialize.
 */
export class RuleLibrary {
  private rules: OutfitRule[] = [];

  constructor(rules: OutfitRule[] = createDefaultRules()) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  /** Throws RangeError when the rule's weight is not a positive number. */
  add(rule: OutfitRule): void {
    assertWeight(rule.weight);
    if (this.get(rule.name)) {
      throw new DuplicateRuleError(rule.name);
    }
    this.rules.push(rule);
  }

  remove(name: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter((rule) => rule.name !== name);
    return this.rules.length !== before;
  }

  get(name: string): OutfitRule | undefined {
    return this.rules.find((rule) => rule.name === name);
  }

  enable(name: string): boolean {
    return this.configure(name, { enabled: true });
  }

  disable(name: string): boolean {
    return this.configure(name, { enabled: false });
  }

  /** Returns false when no rule has that name. Throws RangeError on a non-positive weight. */
  configure(name: string, configuration: RuleConfiguration): boolean {
    const rule = this.get(name);
    if (!rule) {
      return false;
    }
    if (configuration.weight !== undefined) {
      rule.weight = configuration.weight;
    }
    if (configuration.enabled !== undefined) {
      rule.enabled = configuration.enabled;
    }
    return true;
  }

  list(): OutfitRule[] {
    return [...this.rules];
  }

  getEnabled(): OutfitRule[] {
    return this.rules.filter((rule) => rule.enabled);
  }

  describe(): RuleDescriptor[] {
    return this.rules.map(describeRule);
  }
}

export function describeRule(rule: OutfitRule): RuleDescriptor {
  return {
    name: rule.name,
    description: rule.description,
    kind: rule.kind,
    weight: rule.weight,
    enabled: rule.enabled,
  };
}

export type RuleOverrides = Record<string, RuleConfiguration>;

/**
 * Parses "three-color=2,style-coordination=off,context-appropriate=on".
 * A number sets the weight; on/off toggles the rule. Malformed entries are
 * reported and skipped.
 */
export function parseRuleOverrides(raw: string | undefined): RuleOverrides {
  const overrides: RuleOverrides = {};
  if (!raw) {
    return overrides;
  }

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const [name, value] = trimmed.split("=").map((part) => part.trim());
    if (!name || !value) {
      console.warn(`[rule-library] Ignoring malformed rule override "${trimmed}"`);
      continue;
    }

    const current = overrides[name] ?? {};
    const lowered = value.toLowerCase();
    if (lowered === "on" || lowered === "off") {
      overrides[name] = { ...current, enabled: lowered === "on" };
      continue;
    }

    const weight = Number.parseFloat(value);
    if (!Number.isFinite(weight) || weight <= 0) {
      console.warn(`[rule-library] Ignoring rule override "${trimmed}": weight must be positive`);
      continue;
    }
    overrides[name] = { ...current, weight };
  }

  return overrides;
}

/** Returns the names that matched no registered rule. */
export function applyRuleOverrides(library: RuleLibrary, overrides: RuleOverrides): string[] {
  const unknown: string[] = [];
  for (const [name, configuration] of Object.entries(overrides)) {
    if (!library.configure(name, configuration)) {
      unknown.push(name);
    }
  }
  return unknown;
}
