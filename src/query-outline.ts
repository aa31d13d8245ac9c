import type { PredicateArg, QueryPredicate } from './types.js'

/**
 * Outline of a tree-sitter query source: its top-level patterns, the
 * capture names in index order and the predicates declared by each pattern.
 *
 * Capture indices follow tree-sitter's numbering (order of first appearance
 * outside predicates), so a match capture can be looked up by name and turned
 * into the index the predicates refer to.
 */
export interface QueryOutline {
  patternCount: number
  captureNames: string[]
  predicates: QueryPredicate[][] // indexed by pattern
}

type Token =
  | { kind: 'open' | 'close'; bracket: '(' | '[' | ')' | ']' }
  | { kind: 'string'; value: string }
  | { kind: 'capture'; name: string }
  | { kind: 'predicate'; operator: string }
  | { kind: 'word'; value: string }

const DELIMITERS = new Set(['(', ')', '[', ']', '"', '@', '#', ';', ':'])
const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t', '0': '\0' }

function isIdentChar(char: string): boolean {
  return /[A-Za-z0-9_\-.?!]/.test(char)
}

function stringEnd(source: string, start: number): number {
  let i = start + 1
  while (i < source.length && source[i] !== '"') {
    i += source[i] === '\\' ? 2 : 1
  }
  return Math.min(i + 1, source.length)
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < source.length) {
    const char = source[i]

    if (/\s/.test(char) || char === ':') {
      i++
      continue
    }

    if (char === ';') {
      while (i < source.length && source[i] !== '\n') i++
      continue
    }

    if (char === '(' || char === '[') {
      tokens.push({ kind: 'open', bracket: char })
      i++
      continue
    }

    if (char === ')' || char === ']') {
      tokens.push({ kind: 'close', bracket: char })
      i++
      continue
    }

    if (char === '"') {
      let value = ''
      i++
      while (i < source.length && source[i] !== '"') {
        if (source[i] === '\\' && i + 1 < source.length) {
          const escaped = source[i + 1]
          value += ESCAPES[escaped] ?? escaped
          i += 2
        } else {
          value += source[i]
          i++
        }
      }
      i++ // closing quote
      tokens.push({ kind: 'string', value })
      continue
    }

    if (char === '@' || char === '#') {
      let name = ''
      i++
      while (i < source.length && isIdentChar(source[i])) {
        name += source[i]
        i++
      }
      tokens.push(char === '@' ? { kind: 'capture', name } : { kind: 'predicate', operator: name })
      continue
    }

    let word = ''
    while (i < source.length && !/\s/.test(source[i]) && !DELIMITERS.has(source[i])) {
      word += source[i]
      i++
    }
    tokens.push({ kind: 'word', value: word })
  }

  return tokens
}

/**
 * Scan a query source without compiling it.
 *
 * A new pattern starts at every top-level `(`, `[`, string or word token;
 * captures and quantifiers at the top level belong to the preceding pattern.
 */
export function outlineQuery(source: string): QueryOutline {
  const tokens = tokenize(source)
  const captureNames: string[] = []
  const rawPredicates: Array<Array<{ operator: string; args: Token[] }>> = []
  let depth = 0

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]

    if (token.kind === 'open') {
      const next = tokens[i + 1]
      if (token.bracket === '(' && next?.kind === 'predicate') {
        const args: Token[] = []
        let j = i + 2
        while (j < tokens.length && tokens[j].kind !== 'close') {
          args.push(tokens[j])
          j++
        }
        if (depth > 0 && rawPredicates.length > 0) {
          rawPredicates[rawPredicates.length - 1].push({ operator: next.operator, args })
        }
        i = j // skip the closing paren as well
        continue
      }
      if (depth === 0) rawPredicates.push([])
      depth++
      continue
    }

    if (token.kind === 'close') {
      depth = Math.max(0, depth - 1)
      continue
    }

    if (token.kind === 'capture') {
      if (!captureNames.includes(token.name)) captureNames.push(token.name)
      continue
    }

    // Bare top-level strings and wildcards are patterns of their own;
    // quantifiers directly after a pattern are not.
    if (depth === 0 && (token.kind === 'string' || (token.kind === 'word' && !/^[*+?]$/.test(token.value)))) {
      rawPredicates.push([])
    }
  }

  const predicates = rawPredicates.map((patternPredicates) =>
    patternPredicates.flatMap(({ operator, args }) => {
      const resolved: PredicateArg[] = []
      for (const arg of args) {
        if (arg.kind === 'capture') {
          const index = captureNames.indexOf(arg.name)
          if (index === -1) return []
          resolved.push({ type: 'capture', index })
        } else if (arg.kind === 'string' || arg.kind === 'word') {
          resolved.push({ type: 'string', value: arg.value })
        }
      }
      return [{ operator, args: resolved }]
    }),
  )

  return { patternCount: rawPredicates.length, captureNames, predicates }
}

/**
 * Blank out every `(#predicate ...)` form, keeping line and column positions.
 *
 * Predicates do not take part in pattern structure, so the stripped source has
 * the same patterns and captures as the original.
 */
export function stripPredicates(source: string): string {
  let result = ''
  let i = 0

  while (i < source.length) {
    const char = source[i]

    if (char === ';') {
      const end = source.indexOf('\n', i)
      const stop = end === -1 ? source.length : end
      result += source.slice(i, stop)
      i = stop
      continue
    }

    if (char === '"') {
      const end = stringEnd(source, i)
      result += source.slice(i, end)
      i = end
      continue
    }

    if (char === '(') {
      let next = i + 1
      while (next < source.length && /\s/.test(source[next])) next++
      if (source[next] === '#') {
        let j = next
        while (j < source.length && source[j] !== ')') {
          j = source[j] === '"' ? stringEnd(source, j) : j + 1
        }
        const end = Math.min(j + 1, source.length)
        result += source.slice(i, end).replace(/[^\n]/g, ' ')
        i = end
        continue
      }
    }

    result += char
    i++
  }

  return result
}
