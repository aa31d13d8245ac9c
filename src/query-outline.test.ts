import { describe, expect, it } from 'vitest'
import { outlineQuery, stripPredicates } from './query-outline.js'

describe('outlineQuery', () => {
  it('reads one pattern with its captures and predicate', () => {
    const outline = outlineQuery(`
((call_expression
  function: (field_expression field: (field_identifier) @_method)
  (#eq? @_method "unwrap")) @match)
`)

    expect(outline.patternCount).toBe(1)
    expect(outline.captureNames).toEqual(['_method', 'match'])
    expect(outline.predicates).toEqual([
      [
        {
          operator: 'eq?',
          args: [
            { type: 'capture', index: 0 },
            { type: 'string', value: 'unwrap' },
          ],
        },
      ],
    ])
  })

  it('counts every top-level pattern and scopes predicates to their pattern', () => {
    const outline = outlineQuery(`
; Pattern 0: matches unwrap
((field_identifier) @_m (#eq? @_m "unwrap")) @match

; Pattern 1: matches expect (comment with a stray ")")
((field_identifier) @_m (#eq? @_m "expect")) @match
`)

    expect(outline.patternCount).toBe(2)
    expect(outline.captureNames).toEqual(['_m', 'match'])
    expect(outline.predicates[0]).toEqual([
      { operator: 'eq?', args: [{ type: 'capture', index: 0 }, { type: 'string', value: 'unwrap' }] },
    ])
    expect(outline.predicates[1]).toEqual([
      { operator: 'eq?', args: [{ type: 'capture', index: 0 }, { type: 'string', value: 'expect' }] },
    ])
  })

  it('treats an alternation as a single pattern', () => {
    const outline = outlineQuery('[(identifier) (field_identifier)] @match')

    expect(outline.patternCount).toBe(1)
    expect(outline.captureNames).toEqual(['match'])
  })

  it('does not start a pattern at a top-level quantifier', () => {
    expect(outlineQuery('(line_comment)+ @match').patternCount).toBe(1)
    expect(outlineQuery('(line_comment)? @a\n(block_comment)* @b').patternCount).toBe(2)
  })

  it('counts bare wildcards and strings as patterns', () => {
    expect(outlineQuery('_ @match\n"fn" @kw').patternCount).toBe(2)
  })

  it('ignores brackets inside strings', () => {
    const outline = outlineQuery('((identifier) @match (#match? @match "^(foo|bar)$"))')

    expect(outline.patternCount).toBe(1)
    expect(outline.predicates[0]).toEqual([
      { operator: 'match?', args: [{ type: 'capture', index: 0 }, { type: 'string', value: '^(foo|bar)$' }] },
    ])
  })

  it('decodes escapes and bare words in predicate arguments', () => {
    const outline = outlineQuery('((identifier) @id (#any-of? @id "a\\"b" plain))')

    expect(outline.predicates[0]).toEqual([
      {
        operator: 'any-of?',
        args: [
          { type: 'capture', index: 0 },
          { type: 'string', value: 'a"b' },
          { type: 'string', value: 'plain' },
        ],
      },
    ])
  })

  it('does not register captures that only appear in predicates', () => {
    const outline = outlineQuery('((identifier) @id (#eq? @id @other))')

    expect(outline.captureNames).toEqual(['id'])
    expect(outline.predicates[0]).toEqual([])
  })

  it('numbers captures by first appearance across patterns', () => {
    const outline = outlineQuery('(a) @first\n\n((b) @second (c) @first)')

    expect(outline.captureNames).toEqual(['first', 'second'])
    expect(outline.patternCount).toBe(2)
  })

  it('returns no patterns for an empty or comment-only source', () => {
    expect(outlineQuery('').patternCount).toBe(0)
    expect(outlineQuery('; nothing here\n').patternCount).toBe(0)
  })
})

describe('stripPredicates', () => {
  it('blanks predicate forms and keeps the pattern', () => {
    const predicate = '(#eq? @id "a)b")'

    expect(stripPredicates(`((identifier) @id ${predicate})`)).toBe(
      `((identifier) @id ${' '.repeat(predicate.length)})`,
    )
  })

  it('keeps newlines inside a predicate', () => {
    expect(stripPredicates('((a) @x (#eq? @x\n "b"))')).toBe(`((a) @x ${' '.repeat(8)}\n${' '.repeat(5)})`)
  })

  it('leaves comments and strings alone', () => {
    expect(stripPredicates('; (#not a predicate)\n(a) @x')).toBe('; (#not a predicate)\n(a) @x')
    expect(stripPredicates('"(#x)" @kw')).toBe('"(#x)" @kw')
  })

  it('strips every predicate form, unknown operators included', () => {
    const stripped = stripPredicates('((a) @x (#set! k "v") ( #my-check? @x))')

    expect(stripped.includes('#')).toBe(false)
    expect(outlineQuery(stripped).patternCount).toBe(1)
  })
})
