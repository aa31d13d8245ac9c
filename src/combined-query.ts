import type { CompiledQuery, Grammar, Rule } from './types.js'

export interface RuleSlot {
  rule: Rule
  matchCaptureIndex: number // index of @match in the combined query, -1 if absent
}

/** One compiled query per grammar holding the patterns of every applicable rule. */
export interface CombinedQuery {
  grammar: string
  query: CompiledQuery
  patternToRule: readonly RuleSlot[] // indexed by pattern index
}

/**
 * Split rules into language-specific and global (no `languages`) groups,
 * keeping their original order within each group.
 */
export function partitionRules(rules: readonly Rule[]): { specific: Rule[]; global: Rule[] } {
  const specific: Rule[] = []
  const global: Rule[] = []
  for (const rule of rules) {
    if (rule.languages.length > 0) {
      specific.push(rule)
    } else {
      global.push(rule)
    }
  }
  return { specific, global }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Build the combined query for one grammar.
 *
 * Specific rules are compiled only for grammars they list; a failure there is
 * reported through `warn`. Global rules are tried against every grammar and
 * silently dropped where their node kinds do not exist. Returns undefined when
 * no rule survives or when the combined source fails to compile, so the
 * grammar's files are never parsed.
 */
export function buildCombinedQuery(
  grammar: Grammar,
  specific: readonly Rule[],
  global: readonly Rule[],
  warn: (message: string) => void = console.warn,
): CombinedQuery | undefined {
  const compiled: Array<{ rule: Rule; patternCount: number }> = []

  for (const rule of specific) {
    if (!rule.languages.includes(grammar.name)) continue
    try {
      compiled.push({ rule, patternCount: grammar.compile(rule.query).patternCount })
    } catch (error) {
      warn(`Warning: Rule "${rule.id}" failed to compile for ${grammar.name}: ${describe(error)}`)
    }
  }

  for (const rule of global) {
    try {
      compiled.push({ rule, patternCount: grammar.compile(rule.query).patternCount })
    } catch {
      // Node kinds of this rule do not exist in this grammar
    }
  }

  if (compiled.length === 0) {
    return undefined
  }

  const combinedSource = compiled.map(({ rule }) => rule.query).join('\n\n')

  let query: CompiledQuery
  try {
    query = grammar.compile(combinedSource)
  } catch (error) {
    warn(`Warning: combined query failed for ${grammar.name}: ${describe(error)}`)
    return undefined
  }

  const matchCaptureIndex = query.captureNames.indexOf('match')
  const patternToRule: RuleSlot[] = []
  for (const { rule, patternCount } of compiled) {
    for (let i = 0; i < patternCount; i++) {
      patternToRule.push({ rule, matchCaptureIndex })
    }
  }

  return { grammar: grammar.name, query, patternToRule }
}
