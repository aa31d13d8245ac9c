import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'
import fg from 'fast-glob'
import ignore from 'ignore'
import type { GrammarSource } from './types.js'

/**
 * FileCollector finds the source files a run should look at:
 * - Walks the root with fast-glob, hidden files included
 * - Drops anything the root .gitignore excludes
 * - Keeps only files some grammar recognises, grouped by grammar name
 */
export class FileCollector {
  constructor(private ignoreGlobs: string[] = ['**/node_modules/**', '**/.git/**']) {}

  /**
   * Returns absolute paths of candidate files under root, sorted.
   */
  collect(root: string, grammars: GrammarSource): string[] {
    const absoluteRoot = path.resolve(root)
    // CommonJS package: the default import is its module.exports
    const gitignore = ignore.default()
    const gitignorePath = path.join(absoluteRoot, '.gitignore')
    if (existsSync(gitignorePath)) {
      gitignore.add(readFileSync(gitignorePath, 'utf-8'))
    }

    const files = fg.sync('**/*', {
      cwd: absoluteRoot,
      dot: true,
      ignore: this.ignoreGlobs,
      onlyFiles: true,
      unique: true,
    })

    return files
      .filter((relativePath) => !gitignore.ignores(relativePath))
      .filter((relativePath) => grammars.grammarForPath(relativePath) !== undefined)
      .sort()
      .map((relativePath) => path.join(absoluteRoot, relativePath))
  }

  /**
   * Batch operation: returns a Map of grammar name to its files, in the
   * order grammars are first seen.
   */
  groupByGrammar(files: string[], grammars: GrammarSource): Map<string, string[]> {
    const result = new Map<string, string[]>()

    for (const file of files) {
      const grammar = grammars.grammarForPath(file)
      if (!grammar) continue
      const group = result.get(grammar)
      if (group) {
        group.push(file)
      } else {
        result.set(grammar, [file])
      }
    }

    return result
  }
}
