import { describe, expect, it } from 'vitest'
import { applyRuleOverrides } from './rule-overrides.js'
import type { Rule } from './types.js'

function rule(overrides: Partial<Rule> & Pick<Rule, 'id'>): Rule {
  return {
    query: '(identifier) @match',
    languages: ['rust'],
    severity: 'warning',
    message: 'msg',
    allow: [],
    requires: [],
    ...overrides,
  }
}

describe('applyRuleOverrides', () => {
  it('returns rules unchanged without overrides', () => {
    const rules = [rule({ id: 'a' }), rule({ id: 'b' })]

    const result = applyRuleOverrides(rules, { rules: {} })

    expect(result).toEqual(rules)
    expect(result[0]).toBe(rules[0])
  })

  it('overrides severity and appends allow globs without mutating', () => {
    const original = rule({ id: 'a', allow: ['vendor/**'] })

    const [result] = applyRuleOverrides([original], {
      rules: { a: { severity: 'error', allow: ['tests/**'] } },
    })

    expect(result?.severity).toBe('error')
    expect(result?.allow).toEqual(['vendor/**', 'tests/**'])
    expect(original.severity).toBe('warning')
    expect(original.allow).toEqual(['vendor/**'])
  })

  it('drops disabled rules', () => {
    const result = applyRuleOverrides([rule({ id: 'a' }), rule({ id: 'b' })], {
      rules: { a: { enabled: false } },
    })

    expect(result.map((r) => r.id)).toEqual(['b'])
  })

  it('keeps rules explicitly enabled', () => {
    const result = applyRuleOverrides([rule({ id: 'a' })], { rules: { a: { enabled: true } } })

    expect(result.map((r) => r.id)).toEqual(['a'])
  })

  it('ignores overrides for unknown ids', () => {
    const rules = [rule({ id: 'a' })]

    expect(applyRuleOverrides(rules, { rules: { missing: { enabled: false } } })).toEqual(rules)
  })
})
