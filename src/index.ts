export { type CombinedQuery, type RuleSlot, buildCombinedQuery, partitionRules } from './combined-query.js'
export { ConfigLoader, DEFAULT_CONFIG_FILE } from './config-loader.js'
export { FileCollector } from './file-collector.js'
export { applyFixes, expandFixTemplate } from './fix-applier.js'
export { LANGUAGES, type LanguageSupport, supportForGrammar, supportForPath } from './languages.js'
export { evaluatePredicates } from './predicates.js'
export { type QueryOutline, outlineQuery, stripPredicates } from './query-outline.js'
export { checkRequires, compareValues, satisfies } from './requires.js'
export { applyRuleOverrides } from './rule-overrides.js'
export { RuleRunner, type RunOptions, parseDebugFlags, runRules } from './rule-runner.js'
export {
  builtinRegistry,
  EnvSource,
  GitSource,
  PathSource,
  type RuleSource,
  RustSource,
  SourceRegistry,
} from './sources.js'
export { isAllowedByComment, lineHasAllowComment, splitLines } from './suppression.js'
export { TreeSitterGrammar, TreeSitterGrammars } from './tree-sitter-substrate.js'
export type * from './types.js'
