import { readFileSync, writeFileSync } from 'node:fs'
import type { Finding } from './types.js'

/**
 * Expand a fix template by substituting `$name` tokens with capture values.
 * `$match` is the full matched text. Tokens without a capture are kept as is.
 */
export function expandFixTemplate(template: string, captures: Record<string, string>): string {
  let result = template
  for (const [name, value] of Object.entries(captures)) {
    // split/join: a replacement string would give `$&` and friends special meaning
    result = result.split(`$${name}`).join(value)
  }
  return result
}

function groupByFile(findings: readonly Finding[]): Map<string, Finding[]> {
  const byFile = new Map<string, Finding[]>()
  for (const finding of findings) {
    if (!finding.fix) continue
    const group = byFile.get(finding.file)
    if (group) {
      group.push(finding)
    } else {
      byFile.set(finding.file, [finding])
    }
  }
  return byFile
}

/**
 * Apply fixes to findings, returning the number of files modified.
 *
 * Within a file, fixes run from the highest start offset down, so the byte
 * ranges of the fixes still to come are never shifted. A fix overlapping one
 * already applied is skipped. Throws on the first read or write failure;
 * files written before it stay modified.
 */
export function applyFixes(
  findings: readonly Finding[],
  warn: (message: string) => void = console.warn,
): number {
  let filesModified = 0

  for (const [file, fileFindings] of groupByFile(findings)) {
    const ordered = [...fileFindings].sort((a, b) => b.start_byte - a.start_byte)

    let content: Buffer
    try {
      content = readFileSync(file)
    } catch (error) {
      throw new Error(`Failed to read ${file} for fixing: ${describe(error)}`, { cause: error })
    }

    let boundary = content.length
    for (const finding of ordered) {
      if (finding.end_byte > boundary || finding.start_byte > finding.end_byte) {
        warn(
          `Warning: Skipping fix for ${finding.rule_id} at ${file}:${finding.start_line}: overlaps another fix`,
        )
        continue
      }

      const replacement = expandFixTemplate(finding.fix ?? '', finding.captures)
      content = Buffer.concat([
        content.subarray(0, finding.start_byte),
        Buffer.from(replacement, 'utf-8'),
        content.subarray(finding.end_byte),
      ])
      boundary = finding.start_byte
    }

    try {
      writeFileSync(file, content)
    } catch (error) {
      throw new Error(`Failed to write fixes to ${file}: ${describe(error)}`, { cause: error })
    }
    filesModified++
  }

  return filesModified
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
