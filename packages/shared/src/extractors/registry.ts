/**
 * Extraction Rule Registry
 *
 * Registry pattern for field extraction rules.
 * Rules are registered once at module load; each batch derives its own
 * immutable RuleSet from the registry and the naming policy.
 */

import type { FieldName, RuleKind } from '../types';
import type { ConfiguredRule, ExtractionRule, RuleSet, RuleSetOptions } from './types';
import { logger } from '../logger';

/**
 * Map of rule ids to their rules
 */
const ruleRegistry = new Map<string, ExtractionRule>();

/**
 * Register an extraction rule.
 * Overwrites any existing rule with the same id.
 */
export function registerRule(rule: ExtractionRule): void {
  ruleRegistry.set(rule.id, rule);

  logger.debug('Registered extraction rule', {
    rule_id: rule.id,
    field: rule.field,
    kind: rule.kind,
  });
}

/**
 * Get a rule by id, or undefined if not registered.
 */
export function getRule(ruleId: string): ExtractionRule | undefined {
  return ruleRegistry.get(ruleId);
}

/**
 * Get a rule by id, throwing if not found.
 */
export function getRuleOrThrow(ruleId: string): ExtractionRule {
  const rule = ruleRegistry.get(ruleId);
  if (!rule) {
    throw new Error(`No extraction rule registered with id: ${ruleId}`);
  }
  return rule;
}

export function hasRule(ruleId: string): boolean {
  return ruleRegistry.has(ruleId);
}

/**
 * All registered rules in evaluation order: priority, then id.
 */
export function getRules(): ExtractionRule[] {
  return Array.from(ruleRegistry.values()).sort(
    (a, b) => a.priority - b.priority || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * Clear all registered rules.
 * Useful for testing.
 */
export function clearRegistry(): void {
  ruleRegistry.clear();
}

/**
 * Get registry statistics
 */
export function getRegistryStats(): {
  totalRules: number;
  byKind: Partial<Record<RuleKind, number>>;
  fields: FieldName[];
} {
  const rules = getRules();
  const byKind: Partial<Record<RuleKind, number>> = {};
  const fields = new Set<FieldName>();

  for (const rule of rules) {
    byKind[rule.kind] = (byKind[rule.kind] || 0) + 1;
    fields.add(rule.field);
  }

  return {
    totalRules: rules.length,
    byKind,
    fields: Array.from(fields),
  };
}

/**
 * Build the ordered rule set for one batch: disabled rules are dropped and
 * weight overrides replace the defaults.
 */
export function buildRuleSet(options: RuleSetOptions = {}): RuleSet {
  const disabled = new Set(options.disabled ?? []);
  const weights = options.weights ?? {};

  const configured: ConfiguredRule[] = getRules()
    .filter((rule) => !disabled.has(rule.id))
    .map((rule) => Object.freeze({ rule, weight: weights[rule.id] ?? rule.weight }));

  return Object.freeze(configured);
}

/**
 * Rule ids in evaluation order; the resolver's tiebreak.
 */
export function ruleOrder(ruleSet: RuleSet): ReadonlyMap<string, number> {
  return new Map(ruleSet.map((entry, index) => [entry.rule.id, index]));
}
