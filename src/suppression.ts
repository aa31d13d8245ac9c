const MARKER = 'moss-allow:'

/**
 * Check if a line carries `moss-allow: <ruleId>`.
 *
 * Supported forms:
 *   // moss-allow: rule-id
 *   // moss-allow: rule-id - reason
 *   /* moss-allow: rule-id *\/
 *
 * The id must be followed by end of line, whitespace, a `-` that opens a
 * reason, or `*\/`. A dash glued to more id characters does not count, so a
 * marker for `rule-id-extra` does not allow `rule-id`.
 */
export function lineHasAllowComment(line: string, ruleId: string): boolean {
  let position = line.indexOf(MARKER)

  while (position !== -1) {
    const after = line.slice(position + MARKER.length).trimStart()
    if (after.startsWith(ruleId)) {
      const rest = after.slice(ruleId.length)
      if (rest === '' || /^\s/.test(rest) || /^-(\s|$)/.test(rest) || rest.startsWith('*/')) {
        return true
      }
    }
    position = line.indexOf(MARKER, position + MARKER.length)
  }

  return false
}

/**
 * Check the finding's own line and the line above it.
 *
 * @param lines - File content split into lines
 * @param startLine - 1-based line of the finding
 */
export function isAllowedByComment(lines: readonly string[], startLine: number, ruleId: string): boolean {
  const index = startLine - 1

  if (index >= 0 && index < lines.length && lineHasAllowComment(lines[index], ruleId)) {
    return true
  }

  return index > 0 && index - 1 < lines.length && lineHasAllowComment(lines[index - 1], ruleId)
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/)
}
