import type { CompiledQuery, PredicateArg, QueryMatch, QueryPredicate } from './types.js'

/**
 * Supported predicates, classified once from the substrate's description.
 * Anything that cannot be evaluated is `ignored` and never rejects a match.
 */
type Predicate =
  | { kind: 'eq'; negated: boolean; left: PredicateArg; right: PredicateArg }
  | { kind: 'match'; negated: boolean; capture: number; regex: RegExp }
  | { kind: 'any-of'; capture: number; values: string[] }
  | { kind: 'ignored' }

const IGNORED: Predicate = { kind: 'ignored' }

const classified = new WeakMap<QueryPredicate, Predicate>()

function compileRegex(pattern: string): RegExp | undefined {
  try {
    return new RegExp(pattern)
  } catch {
    return undefined
  }
}

function classify(predicate: QueryPredicate): Predicate {
  const [first, ...rest] = predicate.args

  switch (predicate.operator) {
    case 'eq?':
    case 'not-eq?': {
      if (!first || rest.length === 0) return IGNORED
      return { kind: 'eq', negated: predicate.operator === 'not-eq?', left: first, right: rest[0] }
    }
    case 'match?':
    case 'not-match?': {
      const pattern = rest[0]
      if (first?.type !== 'capture' || pattern?.type !== 'string') return IGNORED
      const regex = compileRegex(pattern.value)
      if (!regex) return IGNORED
      return { kind: 'match', negated: predicate.operator === 'not-match?', capture: first.index, regex }
    }
    case 'any-of?': {
      if (first?.type !== 'capture' || rest.length === 0) return IGNORED
      const values = rest.flatMap((arg) => (arg.type === 'string' ? [arg.value] : []))
      return { kind: 'any-of', capture: first.index, values }
    }
    default:
      return IGNORED
  }
}

function predicateFor(predicate: QueryPredicate): Predicate {
  let result = classified.get(predicate)
  if (!result) {
    result = classify(predicate)
    classified.set(predicate, result)
  }
  return result
}

function captureText(match: QueryMatch, index: number): string {
  return match.captures.find((capture) => capture.index === index)?.node.text ?? ''
}

function resolve(match: QueryMatch, arg: PredicateArg): string {
  return arg.type === 'capture' ? captureText(match, arg.index) : arg.value
}

function holds(predicate: Predicate, match: QueryMatch): boolean {
  switch (predicate.kind) {
    case 'eq': {
      const equal = resolve(match, predicate.left) === resolve(match, predicate.right)
      return predicate.negated ? !equal : equal
    }
    case 'match': {
      const matches = predicate.regex.test(captureText(match, predicate.capture))
      return predicate.negated ? !matches : matches
    }
    case 'any-of':
      return predicate.values.includes(captureText(match, predicate.capture))
    case 'ignored':
      return true
  }
}

/**
 * Evaluate every predicate declared by the match's pattern.
 * Returns false at the first predicate that rejects the match.
 */
export function evaluatePredicates(query: CompiledQuery, match: QueryMatch): boolean {
  for (const predicate of query.predicatesForPattern(match.patternIndex)) {
    if (!holds(predicateFor(predicate), match)) {
      return false
    }
  }
  return true
}
