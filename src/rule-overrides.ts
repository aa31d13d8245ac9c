import type { Rule, RulesConfig } from './types.js'

/**
 * Apply per-rule config overrides and drop disabled rules.
 *
 * Rules are never mutated: an overridden rule is a new object with the new
 * severity and the config's allow globs appended to its own. Overrides for
 * ids that match no rule are ignored.
 */
export function applyRuleOverrides(rules: readonly Rule[], config: Pick<RulesConfig, 'rules'>): Rule[] {
  const result: Rule[] = []

  for (const rule of rules) {
    const override = Object.hasOwn(config.rules, rule.id) ? config.rules[rule.id] : undefined
    if (!override) {
      result.push(rule)
      continue
    }

    if (override.enabled === false) {
      continue
    }

    result.push({
      ...rule,
      severity: override.severity ?? rule.severity,
      allow: [...rule.allow, ...(override.allow ?? [])],
    })
  }

  return result
}
