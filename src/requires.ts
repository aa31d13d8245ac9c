import type { Rule, SourceContext, SourceLookup } from './types.js'

const DOTTED_NUMBER = /^\d+(\.\d+)*$/

/**
 * Order two source values. Dotted numbers such as `2021` or `1.70.0` compare
 * segment by segment as numbers, so "9" sorts before "10"; any other pair
 * compares as plain strings.
 */
export function compareValues(actual: string, expected: string): number {
  if (DOTTED_NUMBER.test(actual) && DOTTED_NUMBER.test(expected)) {
    const a = actual.split('.').map(Number)
    const b = expected.split('.').map(Number)
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0)
      if (diff !== 0) return Math.sign(diff)
    }
    return 0
  }

  if (actual === expected) return 0
  return actual < expected ? -1 : 1
}

/**
 * Test one resolved value against an expectation:
 * - `value` exact match
 * - `>=value` greater or equal
 * - `<=value` less or equal
 * - `!value` not equal
 */
export function satisfies(actual: string, expected: string): boolean {
  if (expected.startsWith('>=')) {
    return compareValues(actual, expected.slice(2)) >= 0
  }
  if (expected.startsWith('<=')) {
    return compareValues(actual, expected.slice(2)) <= 0
  }
  if (expected.startsWith('!')) {
    return actual !== expected.slice(1)
  }
  return actual === expected
}

/**
 * Check whether every `requires` condition of a rule holds for a file.
 * A key the registry cannot resolve fails the rule.
 */
export function checkRequires(rule: Rule, registry: SourceLookup, ctx: SourceContext): boolean {
  for (const [key, expected] of rule.requires) {
    const actual = registry.get(ctx, key)
    if (actual === undefined || !satisfies(actual, expected)) {
      return false
    }
  }
  return true
}
