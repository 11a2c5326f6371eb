/**
 * File-level Visitors
 *
 * Single-line statements: `syntax`, `package` and `import`.
 */

import { Errors } from '../errors/index.js'
import type { Line, VisitResult } from './types.js'
import type { Visitor } from './visitor.js'

const SYNTAX_PATTERN = /^\s*syntax\s*=\s*["']([^"']+)["']/
const PACKAGE_PATTERN = /^\s*package\s+([\w.]+)/
const IMPORT_PATTERN = /^\s*import\s+(?:(?:public|weak)\s+)?["']([^"']+)["']/

function capture(kind: string, pattern: RegExp, line: Line): VisitResult<string> {
  const match = pattern.exec(line.syntax)
  if (!match) {
    throw Errors.unexpectedLine(kind, line.number, line.syntax)
  }
  return { entity: match[1] }
}

export function createSyntaxVisitor(): Visitor<'syntax'> {
  return {
    kind: 'syntax',
    canVisit: (line) => SYNTAX_PATTERN.test(line.syntax),
    visit: (_source, line) => capture('syntax', SYNTAX_PATTERN, line),
  }
}

export function createPackageVisitor(): Visitor<'package'> {
  return {
    kind: 'package',
    canVisit: (line) => PACKAGE_PATTERN.test(line.syntax),
    visit: (_source, line) => capture('package', PACKAGE_PATTERN, line),
  }
}

export function createImportVisitor(): Visitor<'import'> {
  return {
    kind: 'import',
    canVisit: (line) => IMPORT_PATTERN.test(line.syntax),
    visit: (_source, line) => capture('import', IMPORT_PATTERN, line),
  }
}
