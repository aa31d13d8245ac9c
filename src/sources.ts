import { execSync } from 'node:child_process'
import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { parse as parseToml } from '@iarna/toml'
import type { SourceContext, SourceLookup } from './types.js'

/**
 * A source of per-file data for rule `requires` conditions.
 *
 * Each source owns a namespace ("env", "path", ...) and returns the keys
 * available under it, or undefined when it does not apply to the file.
 */
export interface RuleSource {
  readonly namespace: string
  evaluate(ctx: SourceContext): Record<string, string> | undefined
}

export class SourceRegistry implements SourceLookup {
  private sources: RuleSource[] = []

  /** Sources are consulted in registration order. */
  register(source: RuleSource): this {
    this.sources.push(source)
    return this
  }

  /** Evaluate all sources into one `namespace.key` → value map. */
  evaluate(ctx: SourceContext): Record<string, string> {
    const result: Record<string, string> = {}
    for (const source of this.sources) {
      const values = source.evaluate(ctx)
      if (!values) continue
      for (const [key, value] of Object.entries(values)) {
        result[`${source.namespace}.${key}`] = value
      }
    }
    return result
  }

  /** Get a value by full key, e.g. `rust.edition`. */
  get(ctx: SourceContext, key: string): string | undefined {
    const dot = key.indexOf('.')
    if (dot === -1) {
      return undefined
    }

    const namespace = key.slice(0, dot)
    const field = key.slice(dot + 1)

    for (const source of this.sources) {
      if (source.namespace !== namespace) continue
      const values = source.evaluate(ctx)
      if (values) {
        return Object.hasOwn(values, field) ? values[field] : undefined
      }
    }
    return undefined
  }
}

// --- Built-in sources ---

export class EnvSource implements RuleSource {
  readonly namespace = 'env'

  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  evaluate(): Record<string, string> {
    const result: Record<string, string> = {}
    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined) result[key] = value
    }
    return result
  }
}

export class PathSource implements RuleSource {
  readonly namespace = 'path'

  evaluate(ctx: SourceContext): Record<string, string> {
    const result: Record<string, string> = {
      rel: ctx.relPath,
      abs: ctx.filePath,
      filename: path.basename(ctx.filePath),
    }
    const ext = path.extname(ctx.filePath)
    if (ext) {
      result.ext = ext.slice(1)
    }
    return result
  }
}

/**
 * Repository state: `git.branch`, `git.staged`, `git.dirty`.
 * Git is invoked once per project root; a failing command leaves its keys unset.
 */
export class GitSource implements RuleSource {
  readonly namespace = 'git'
  private cache = new Map<string, { branch?: string; staged?: Set<string>; dirty?: boolean }>()

  evaluate(ctx: SourceContext): Record<string, string> {
    const state = this.stateFor(ctx.projectRoot)
    const result: Record<string, string> = {}

    if (state.branch !== undefined) result.branch = state.branch
    if (state.staged !== undefined) result.staged = String(state.staged.has(ctx.relPath))
    if (state.dirty !== undefined) result.dirty = String(state.dirty)

    return result
  }

  private stateFor(root: string) {
    let state = this.cache.get(root)
    if (!state) {
      const staged = this.git(root, 'diff --cached --name-only')
      const status = this.git(root, 'status --porcelain')
      state = {
        branch: this.git(root, 'rev-parse --abbrev-ref HEAD')?.trim(),
        staged:
          staged === undefined ? undefined : new Set(staged.split('\n').filter((line) => line.length > 0)),
        dirty: status === undefined ? undefined : status.trim().length > 0,
      }
      this.cache.set(root, state)
    }
    return state
  }

  private git(cwd: string, args: string): string | undefined {
    try {
      return execSync(`git ${args}`, { cwd, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] })
    } catch {
      // Not a repository, or git is not installed
      return undefined
    }
  }
}

type TomlTable = ReturnType<typeof parseToml>

function tableOf(value: unknown): TomlTable | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Date) {
    return undefined
  }
  const table: TomlTable = {}
  for (const [key, entry] of Object.entries(value)) {
    table[key] = entry
  }
  return table
}

function stringOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return undefined
}

/**
 * Rust project data from the nearest Cargo.toml:
 * `rust.edition`, `rust.resolver`, `rust.name`, `rust.version`.
 * Each manifest is read once per source instance.
 */
export class RustSource implements RuleSource {
  readonly namespace = 'rust'
  private manifests = new Map<string, Record<string, string> | undefined>()

  evaluate(ctx: SourceContext): Record<string, string> | undefined {
    if (path.extname(ctx.filePath) !== '.rs') {
      return undefined
    }

    const manifest = RustSource.findCargoToml(ctx.filePath)
    if (!manifest) {
      return undefined
    }

    if (!this.manifests.has(manifest)) {
      this.manifests.set(manifest, RustSource.readManifest(manifest))
    }
    return this.manifests.get(manifest)
  }

  private static readManifest(manifest: string): Record<string, string> | undefined {
    try {
      return RustSource.parseCargoToml(readFileSync(manifest, 'utf-8'))
    } catch {
      // Unreadable or malformed manifest: no rust.* keys for its files
      return undefined
    }
  }

  static findCargoToml(filePath: string): string | undefined {
    let current = path.dirname(filePath)
    for (;;) {
      const candidate = path.join(current, 'Cargo.toml')
      if (existsSync(candidate)) {
        return candidate
      }
      const parent = path.dirname(current)
      if (parent === current) {
        return undefined
      }
      current = parent
    }
  }

  static parseCargoToml(content: string): Record<string, string> {
    const doc = parseToml(content)
    const pkg = tableOf(doc.package)
    const workspace = tableOf(doc.workspace)
    const result: Record<string, string> = {}

    const fields: Array<[string, unknown]> = [
      ['edition', pkg?.edition],
      ['name', pkg?.name],
      ['version', pkg?.version],
      ['resolver', pkg?.resolver ?? workspace?.resolver],
    ]
    for (const [key, value] of fields) {
      const text = stringOf(value)
      if (text !== undefined) result[key] = text
    }

    return result
  }
}

/** Registry with every built-in source. */
export function builtinRegistry(): SourceRegistry {
  return new SourceRegistry()
    .register(new EnvSource())
    .register(new PathSource())
    .register(new GitSource())
    .register(new RustSource())
}
