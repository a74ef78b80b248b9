import type { Dependency } from '../../types.js'
import { leadingVersion } from '../../normalize.js'

// Checked in this order; the first one present in an entry wins
const OPERATORS = ['==', '>=', '<=', '>', '<', '~='] as const

export function parseConstraint(entry: string): Dependency | undefined {
  const line = entry.trim()
  if (!line || line.startsWith('#')) return undefined

  for (const op of OPERATORS) {
    const at = line.indexOf(op)
    if (at === -1) continue
    const name = line.slice(0, at).trim()
    // a bare constraint such as "==1.0" names nothing
    if (!name) return undefined
    return { name, version: line.slice(at + op.length).trim() }
  }
  return { name: line }
}

export function parseConstraintList(entries: readonly string[]): Dependency[] {
  const out: Dependency[] = []
  for (const entry of entries) {
    const dep = parseConstraint(entry)
    if (dep) out.push(dep)
  }
  return out
}

const PROJECT_NAME = /^[A-Za-z0-9._-]+/
const EXTRAS = /^\s*\[[^\]]*\]/

/**
 * One requirements.txt line: the project name up to extras or operator, and the numeric
 * version after the first operator. Inline comments, `;` markers and a trailing `\`
 * continuation are dropped; option lines (-r, -e, --hash ...) and URLs are not packages.
 */
export function parseRequirementLine(raw: string): Dependency | undefined {
  const line = (raw.replace(/(^|\s)#.*$/, '').replace(/\\\s*$/, '').split(';')[0] ?? '').trim()
  if (!line || line.startsWith('-') || line.includes('://')) return undefined

  const name = line.match(PROJECT_NAME)?.[0]
  if (!name) return undefined
  const rest = line.slice(name.length).replace(EXTRAS, '')
  for (const op of OPERATORS) {
    const at = rest.indexOf(op)
    if (at === -1) continue
    const version = leadingVersion(rest.slice(at + op.length))
    return version === undefined ? { name } : { name, version }
  }
  return { name }
}

export function parseRequirementsText(text: string): Dependency[] {
  const out: Dependency[] = []
  for (const line of text.split(/\r?\n/)) {
    const dep = parseRequirementLine(line)
    if (dep) out.push(dep)
  }
  return out
}
