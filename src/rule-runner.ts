import { readFileSync } from 'node:fs'
import path from 'node:path'
import micromatch from 'micromatch'
import { buildCombinedQuery, type CombinedQuery, partitionRules } from './combined-query.js'
import { FileCollector } from './file-collector.js'
import { evaluatePredicates } from './predicates.js'
import { checkRequires } from './requires.js'
import { builtinRegistry } from './sources.js'
import { isAllowedByComment, splitLines } from './suppression.js'
import type {
  DebugFlags,
  Finding,
  GrammarSource,
  QueryMatch,
  Rule,
  SourceContext,
  SourceLookup,
  SourceTree,
} from './types.js'

export interface RunOptions {
  filterRuleId?: string
  debug?: DebugFlags
}

interface RuleRunnerDeps {
  grammars: GrammarSource
  registry?: SourceLookup
  collector?: FileCollector
  warn?: (message: string) => void
  log?: (message: string) => void
}

/**
 * Map debug category names to flags; `all` enables every category.
 */
export function parseDebugFlags(names: readonly string[]): DebugFlags {
  const all = names.includes('all')
  return { timing: all || names.includes('timing') }
}

/**
 * Allow globs follow shell-style matching where `*` may cross directories:
 * a segment that is only `*` widens to `**`, and a glob without a slash is
 * matched against the file name. Hidden paths match like any other.
 */
function isAllowedPath(relPath: string, globs: readonly string[]): boolean {
  const widened = globs.map((glob) =>
    glob
      .split('/')
      .map((segment) => (segment === '*' ? '**' : segment))
      .join('/'),
  )
  return micromatch.isMatch(relPath, widened, { dot: true, basename: true })
}

function firstLine(text: string): string {
  const end = text.indexOf('\n')
  return (end === -1 ? text : text.slice(0, end)).replace(/\r$/, '')
}

/**
 * RuleRunner executes rules over a source tree with one parse and one query
 * traversal per file, however many rules apply.
 *
 * Per match the owning rule is found by pattern index, then gated in order:
 * allow globs, `requires` conditions, query predicates, `moss-allow` comments.
 */
export class RuleRunner {
  private registry: SourceLookup
  private collector: FileCollector
  private warn: (message: string) => void
  private log: (message: string) => void

  constructor(private deps: RuleRunnerDeps) {
    this.registry = deps.registry ?? builtinRegistry()
    this.collector = deps.collector ?? new FileCollector()
    this.warn = deps.warn ?? console.warn
    this.log = deps.log ?? console.error
  }

  run(rules: readonly Rule[], root: string, options: RunOptions = {}): Finding[] {
    const timing = options.debug?.timing ?? false
    const start = Date.now()
    const findings: Finding[] = []
    const projectRoot = path.resolve(root)

    const activeRules = rules.filter(
      (rule) => options.filterRuleId === undefined || rule.id === options.filterRuleId,
    )
    if (activeRules.length === 0) {
      return findings
    }

    // Collect all source files and group by grammar
    const files = this.collector.collect(projectRoot, this.deps.grammars)
    const filesByGrammar = this.collector.groupByGrammar(files, this.deps.grammars)

    if (timing) {
      this.log(`[timing] file collection: ${Date.now() - start}ms`)
    }
    const compileStart = Date.now()

    const { specific, global } = partitionRules(activeRules)
    const combinedByGrammar = new Map<string, CombinedQuery>()

    for (const grammarName of filesByGrammar.keys()) {
      const grammar = this.deps.grammars.get(grammarName)
      if (!grammar) continue

      const combined = buildCombinedQuery(grammar, specific, global, this.warn)
      if (combined) {
        combinedByGrammar.set(grammarName, combined)
      }
    }

    if (timing) {
      this.log(
        `[timing] query compilation: ${Date.now() - compileStart}ms (${combinedByGrammar.size} grammars)`,
      )
    }
    const processStart = Date.now()

    for (const [grammarName, grammarFiles] of filesByGrammar) {
      const combined = combinedByGrammar.get(grammarName)
      if (!combined) continue

      const parser = this.deps.grammars.get(grammarName)?.createParser()
      if (!parser) continue

      for (const file of grammarFiles) {
        let content: string
        try {
          content = readFileSync(file, 'utf-8')
        } catch {
          // Unreadable file: nothing to report for it
          continue
        }

        const tree = parser.parse(content)
        if (!tree) continue

        const ctx: SourceContext = {
          filePath: file,
          relPath: path.relative(projectRoot, file).replace(/\\/g, '/'),
          projectRoot,
        }

        this.matchFile(combined, tree, ctx, findings)
      }
    }

    if (timing) {
      this.log(`[timing] file processing: ${Date.now() - processStart}ms (${findings.length} findings)`)
      this.log(`[timing] total: ${Date.now() - start}ms`)
    }

    return findings
  }

  private matchFile(combined: CombinedQuery, tree: SourceTree, ctx: SourceContext, findings: Finding[]): void {
    let lines: string[] | undefined

    // Single query execution - one traversal for all rules
    for (const match of combined.query.matches(tree)) {
      const slot = combined.patternToRule[match.patternIndex]
      if (!slot) continue
      const { rule, matchCaptureIndex } = slot

      if (rule.allow.length > 0 && isAllowedPath(ctx.relPath, rule.allow)) {
        continue
      }

      if (!checkRequires(rule, this.registry, ctx)) {
        continue
      }

      if (!evaluatePredicates(combined.query, match)) {
        continue
      }

      const capture = match.captures.find((c) => c.index === matchCaptureIndex)
      if (!capture) continue

      const { node } = capture
      const startLine = node.startPosition.row + 1

      lines ??= splitLines(tree.source)
      if (isAllowedByComment(lines, startLine, rule.id)) {
        continue
      }

      findings.push({
        rule_id: rule.id,
        file: ctx.filePath,
        start_line: startLine,
        start_col: node.startPosition.column + 1,
        end_line: node.endPosition.row + 1,
        end_col: node.endPosition.column + 1,
        start_byte: node.startByte,
        end_byte: node.endByte,
        message: rule.message,
        severity: rule.severity,
        matched_text: firstLine(node.text),
        fix: rule.fix,
        captures: this.snapshotCaptures(combined, match),
      })
    }
  }

  private snapshotCaptures(combined: CombinedQuery, match: QueryMatch): Record<string, string> {
    const captures: Record<string, string> = {}
    for (const capture of match.captures) {
      const name = combined.query.captureNames[capture.index]
      if (name !== undefined) {
        captures[name] = capture.node.text
      }
    }
    return captures
  }
}

/**
 * Run rules against every recognised file under root.
 */
export function runRules(
  rules: readonly Rule[],
  root: string,
  grammars: GrammarSource,
  options: RunOptions & Omit<RuleRunnerDeps, 'grammars'> = {},
): Finding[] {
  const { filterRuleId, debug, ...deps } = options
  return new RuleRunner({ grammars, ...deps }).run(rules, root, { filterRuleId, debug })
}
