import { describe, expect, it, vi } from 'vitest'
import { evaluatePredicates } from './predicates.js'
import { TreeSitterGrammars } from './tree-sitter-substrate.js'
import type { Grammar } from './types.js'

function rustGrammar(): Grammar {
  const grammar = new TreeSitterGrammars().get('rust')
  if (!grammar) throw new Error('rust grammar unavailable')
  return grammar
}

describe('TreeSitterGrammars', () => {
  it('maps file extensions to grammar names', () => {
    const grammars = new TreeSitterGrammars()

    expect(grammars.grammarForPath('src/main.rs')).toBe('rust')
    expect(grammars.grammarForPath('app/view.tsx')).toBe('tsx')
    expect(grammars.grammarForPath('lib/util.ts')).toBe('typescript')
    expect(grammars.grammarForPath('tool.py')).toBe('python')
    expect(grammars.grammarForPath('README.md')).toBeUndefined()
  })

  it('loads every bundled grammar', () => {
    const warn = vi.fn()
    const grammars = new TreeSitterGrammars(warn)

    for (const name of ['rust', 'javascript', 'typescript', 'tsx', 'python']) {
      expect(grammars.get(name)?.name).toBe(name)
    }
    expect(warn).not.toHaveBeenCalled()
  })

  it('returns undefined for an unknown grammar', () => {
    expect(new TreeSitterGrammars().get('cobol')).toBeUndefined()
  })

  it('caches loaded grammars', () => {
    const grammars = new TreeSitterGrammars()

    expect(grammars.get('rust')).toBe(grammars.get('rust'))
  })
})

describe('TreeSitterGrammar', () => {
  it('throws when a query uses node kinds the grammar lacks', () => {
    expect(() => rustGrammar().compile('(decorated_definition) @match')).toThrow()
  })

  it('reports pattern count and capture names', () => {
    const query = rustGrammar().compile('(line_comment) @match\n\n(call_expression function: (identifier) @fn) @match')

    expect(query.patternCount).toBe(2)
    expect(query.captureNames).toEqual(['match', 'fn'])
  })

  it('matches with byte positions and scopes predicates per pattern', () => {
    const grammar = rustGrammar()
    const query = grammar.compile(
      '((field_identifier) @m (#eq? @m "unwrap"))\n((field_identifier) @m (#eq? @m "expect"))',
    )
    const tree = grammar.createParser()?.parse('fn main() { a.unwrap(); b.expect("x"); }')
    if (!tree) throw new Error('parse failed')

    const matches = query.matches(tree).filter((match) => evaluatePredicates(query, match))

    expect(matches.map((match) => [match.patternIndex, match.captures[0]?.node.text])).toEqual([
      [0, 'unwrap'],
      [1, 'expect'],
    ])
    const node = matches[0]?.captures[0]?.node
    expect(node?.startByte).toBe(14)
    expect(node?.endByte).toBe(20)
    expect(node?.startPosition).toEqual({ row: 0, column: 14 })
  })

  it('compiles predicates the bindings would reject and leaves them to the evaluator', () => {
    const grammar = rustGrammar()

    for (const predicate of ['(#my-custom? @m "x")', '(#match? @m "[")', '(#eq? "unwrap" @m)']) {
      const query = grammar.compile(`((field_identifier) @m ${predicate})`)
      expect(query.patternCount).toBe(1)
      expect(query.predicatesForPattern(0)).toHaveLength(1)
    }
  })

  it('reports columns in bytes on lines with non-ASCII text', () => {
    const grammar = rustGrammar()
    const query = grammar.compile('(macro_invocation) @match')
    const tree = grammar.createParser()?.parse('fn main() { let s = "éé"; dbg!(s); }')
    if (!tree) throw new Error('parse failed')

    const node = query.matches(tree)[0]?.captures[0]?.node

    expect(node?.startPosition).toEqual({ row: 0, column: 28 })
    expect(node?.endPosition).toEqual({ row: 0, column: 35 })
    expect(node?.startByte).toBe(28)
    expect(node?.text).toBe('dbg!(s)')
  })

  it('rejects trees from another substrate', () => {
    const query = rustGrammar().compile('(identifier) @match')

    expect(() => query.matches({ source: 'fn main() {}' })).toThrow(
      'Query can only run against a tree parsed by the tree-sitter substrate',
    )
  })
})
