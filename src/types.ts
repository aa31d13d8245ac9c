// --- Rule Types ---

export type Severity = 'error' | 'warning' | 'info'

export interface Rule {
  id: string
  query: string // tree-sitter query source, must expose a @match capture
  languages: string[] // empty = every grammar
  severity: Severity
  message: string
  fix?: string // template with $capture tokens
  allow: string[] // globs relative to the project root
  requires: Array<[key: string, expected: string]>
}

// --- Result Types ---

export interface Finding {
  rule_id: string
  file: string // absolute path
  start_line: number // 1-based
  start_col: number // 1-based
  end_line: number
  end_col: number
  start_byte: number // UTF-8 offset into the file
  end_byte: number
  message: string
  severity: Severity
  matched_text: string // first line only
  fix?: string
  captures: Record<string, string>
}

export interface DebugFlags {
  timing: boolean
}

// --- Source Types ---

export interface SourceContext {
  filePath: string
  relPath: string
  projectRoot: string
}

export interface SourceLookup {
  get(ctx: SourceContext, key: string): string | undefined
}

// --- Substrate Types ---

export interface Point {
  row: number // 0-based
  column: number // 0-based
}

export interface SyntaxNode {
  readonly startPosition: Point
  readonly endPosition: Point
  readonly startByte: number
  readonly endByte: number
  readonly text: string
}

export type PredicateArg = { type: 'capture'; index: number } | { type: 'string'; value: string }

export interface QueryPredicate {
  operator: string // without the leading '#', e.g. 'eq?'
  args: PredicateArg[]
}

export interface QueryCapture {
  index: number
  node: SyntaxNode
}

export interface QueryMatch {
  patternIndex: number
  captures: QueryCapture[]
}

export interface SourceTree {
  readonly source: string
}

export interface CompiledQuery {
  readonly patternCount: number
  readonly captureNames: readonly string[]
  predicatesForPattern(patternIndex: number): readonly QueryPredicate[]
  matches(tree: SourceTree): QueryMatch[]
}

export interface SourceParser {
  parse(source: string): SourceTree | undefined
}

export interface Grammar {
  readonly name: string
  /** Throws when the query does not compile against this grammar. */
  compile(querySource: string): CompiledQuery
  createParser(): SourceParser | undefined
}

export interface GrammarSource {
  get(name: string): Grammar | undefined
  grammarForPath(filePath: string): string | undefined
}

// --- Config Types ---

export interface RuleOverride {
  severity?: Severity
  enabled?: boolean
  allow?: string[]
}

export interface RulesConfig {
  debug: DebugFlags
  rules: Record<string, RuleOverride>
}
