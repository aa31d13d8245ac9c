import { createRequire } from 'node:module'
import Parser from 'tree-sitter'
import { type LanguageSupport, supportForGrammar, supportForPath } from './languages.js'
import { type QueryOutline, outlineQuery, stripPredicates } from './query-outline.js'
import type {
  CompiledQuery,
  Grammar,
  GrammarSource,
  Point,
  QueryMatch,
  QueryPredicate,
  SourceParser,
  SourceTree,
  SyntaxNode,
} from './types.js'

const requireGrammar = createRequire(import.meta.url)

// The bindings read string input in chunks of this many code units.
const MIN_BUFFER_SIZE = 32 * 1024

class TreeSitterTree implements SourceTree {
  private readonly ascii: boolean

  constructor(
    readonly source: string,
    readonly native: Parser.Tree,
  ) {
    this.ascii = Buffer.byteLength(source, 'utf-8') === source.length
  }

  /** Convert a UTF-16 index reported by the bindings into a UTF-8 byte offset. */
  byteOffset(index: number): number {
    return this.ascii ? index : Buffer.byteLength(this.source.slice(0, index), 'utf-8')
  }

  /** Re-express a native point, whose column counts UTF-16 units, with a byte column. */
  point(native: Parser.Point, index: number): Point {
    if (this.ascii) {
      return { row: native.row, column: native.column }
    }
    const lineStart = index - native.column
    return {
      row: native.row,
      column: Buffer.byteLength(this.source.slice(lineStart, index), 'utf-8'),
    }
  }
}

class TreeSitterNode implements SyntaxNode {
  constructor(
    private readonly tree: TreeSitterTree,
    private readonly native: Parser.SyntaxNode,
  ) {}

  get startPosition(): Point {
    return this.tree.point(this.native.startPosition, this.native.startIndex)
  }

  get endPosition(): Point {
    return this.tree.point(this.native.endPosition, this.native.endIndex)
  }

  get startByte(): number {
    return this.tree.byteOffset(this.native.startIndex)
  }

  get endByte(): number {
    return this.tree.byteOffset(this.native.endIndex)
  }

  get text(): string {
    return this.tree.source.slice(this.native.startIndex, this.native.endIndex)
  }
}

class TreeSitterQuery implements CompiledQuery {
  private readonly captureIndex: Map<string, number>

  constructor(
    private readonly native: Parser.Query,
    private readonly outline: QueryOutline,
  ) {
    this.captureIndex = new Map(outline.captureNames.map((name, index) => [name, index]))
  }

  get patternCount(): number {
    return this.outline.patternCount
  }

  get captureNames(): readonly string[] {
    return this.outline.captureNames
  }

  predicatesForPattern(patternIndex: number): readonly QueryPredicate[] {
    return this.outline.predicates[patternIndex] ?? []
  }

  matches(tree: SourceTree): QueryMatch[] {
    if (!(tree instanceof TreeSitterTree)) {
      throw new Error('Query can only run against a tree parsed by the tree-sitter substrate')
    }

    return this.native.matches(tree.native.rootNode).map((match) => ({
      patternIndex: match.pattern,
      captures: match.captures.flatMap((capture) => {
        const index = this.captureIndex.get(capture.name)
        return index === undefined ? [] : [{ index, node: new TreeSitterNode(tree, capture.node) }]
      }),
    }))
  }
}

class TreeSitterParser implements SourceParser {
  constructor(private readonly native: Parser) {}

  parse(source: string): SourceTree | undefined {
    try {
      const tree = this.native.parse(source, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, source.length + 1),
      })
      return new TreeSitterTree(source, tree)
    } catch {
      // Tree-sitter recovers from malformed input; a throw here means setup failed.
      return undefined
    }
  }
}

export class TreeSitterGrammar implements Grammar {
  constructor(
    readonly name: string,
    private readonly language: unknown,
  ) {}

  /**
   * Predicates are evaluated by `evaluatePredicates` from the outline, so the
   * bindings only see the pattern structure.
   */
  compile(querySource: string): CompiledQuery {
    const native = new Parser.Query(this.language, stripPredicates(querySource))
    return new TreeSitterQuery(native, outlineQuery(querySource))
  }

  createParser(): SourceParser | undefined {
    try {
      const parser = new Parser()
      parser.setLanguage(this.language)
      return new TreeSitterParser(parser)
    } catch {
      return undefined
    }
  }
}

/**
 * TreeSitterGrammars loads grammar packages on first use and keeps them for
 * the lifetime of the instance.
 *
 * A grammar whose package cannot be loaded is reported once through `warn`
 * and then treated as unavailable.
 */
export class TreeSitterGrammars implements GrammarSource {
  private loaded = new Map<string, Grammar | undefined>()

  constructor(private warn: (message: string) => void = console.warn) {}

  get(name: string): Grammar | undefined {
    if (this.loaded.has(name)) {
      return this.loaded.get(name)
    }

    const support = supportForGrammar(name)
    const grammar = support ? this.load(support) : undefined
    this.loaded.set(name, grammar)
    return grammar
  }

  grammarForPath(filePath: string): string | undefined {
    return supportForPath(filePath)?.grammar
  }

  private load(support: LanguageSupport): Grammar | undefined {
    try {
      const exported: unknown = requireGrammar(support.packageName)
      const language =
        support.exportName && typeof exported === 'object' && exported !== null
          ? Reflect.get(exported, support.exportName)
          : exported

      if (!language) {
        this.warn(`Warning: ${support.packageName} has no grammar named "${support.grammar}"`)
        return undefined
      }

      return new TreeSitterGrammar(support.grammar, language)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.warn(`Warning: Failed to load grammar "${support.grammar}": ${reason}`)
      return undefined
    }
  }
}
