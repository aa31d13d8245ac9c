import path from 'node:path'

export interface LanguageSupport {
  grammar: string // name used in Rule.languages
  packageName: string
  exportName?: string // for packages that bundle several grammars
  extensions: string[]
}

export const LANGUAGES: LanguageSupport[] = [
  { grammar: 'rust', packageName: 'tree-sitter-rust', extensions: ['.rs'] },
  {
    grammar: 'javascript',
    packageName: 'tree-sitter-javascript',
    extensions: ['.js', '.mjs', '.cjs', '.jsx'],
  },
  {
    grammar: 'typescript',
    packageName: 'tree-sitter-typescript',
    exportName: 'typescript',
    extensions: ['.ts', '.mts', '.cts'],
  },
  {
    grammar: 'tsx',
    packageName: 'tree-sitter-typescript',
    exportName: 'tsx',
    extensions: ['.tsx'],
  },
  { grammar: 'python', packageName: 'tree-sitter-python', extensions: ['.py', '.pyi'] },
]

const BY_EXTENSION = new Map<string, LanguageSupport>(
  LANGUAGES.flatMap((language) => language.extensions.map((ext) => [ext, language] as const)),
)

/**
 * Detect the grammar for a file from its extension.
 * Returns undefined for files no grammar recognises.
 */
export function supportForPath(filePath: string): LanguageSupport | undefined {
  return BY_EXTENSION.get(path.extname(filePath).toLowerCase())
}

export function supportForGrammar(grammar: string): LanguageSupport | undefined {
  return LANGUAGES.find((language) => language.grammar === grammar)
}
