/**
 * Dispatcher
 *
 * Tries each registered visitor against a line, in registration order, and
 * runs the first one that claims it.
 */

import { createImportVisitor, createPackageVisitor, createSyntaxVisitor } from './file-visitors.js'
import { createMessageVisitor } from './message-visitor.js'
import { createRpcVisitor } from './rpc-visitor.js'
import { createServiceVisitor } from './service-visitor.js'
import type { Line, LineSource } from './types.js'
import type { AnyVisitor, Visited } from './visitor.js'

export interface Dispatcher {
  /** Visitors in the order they are tried */
  readonly visitors: readonly AnyVisitor[]
  /** First visitor claiming `line` */
  find(line: Line): AnyVisitor | undefined
  /** Visit `line` with the first visitor claiming it; undefined when none does */
  dispatch(source: LineSource, line: Line, namespace: string): Visited | undefined
}

function run(visitor: AnyVisitor, source: LineSource, line: Line, namespace: string): Visited {
  switch (visitor.kind) {
    case 'syntax':
      return { kind: 'syntax', result: visitor.visit(source, line, namespace) }
    case 'package':
      return { kind: 'package', result: visitor.visit(source, line, namespace) }
    case 'import':
      return { kind: 'import', result: visitor.visit(source, line, namespace) }
    case 'service':
      return { kind: 'service', result: visitor.visit(source, line, namespace) }
    case 'message':
      return { kind: 'message', result: visitor.visit(source, line, namespace) }
    case 'rpc':
      return { kind: 'rpc', result: visitor.visit(source, line, namespace) }
  }
}

export function createDispatcher(visitors: readonly AnyVisitor[]): Dispatcher {
  function find(line: Line): AnyVisitor | undefined {
    return visitors.find((visitor) => visitor.canVisit(line))
  }

  return {
    visitors,
    find,

    dispatch(source: LineSource, line: Line, namespace: string): Visited | undefined {
      const visitor = find(line)
      return visitor ? run(visitor, source, line, namespace) : undefined
    },
  }
}

/**
 * Visitors for every construct the parser understands
 */
export function createDefaultVisitors(): AnyVisitor[] {
  return [
    createSyntaxVisitor(),
    createPackageVisitor(),
    createImportVisitor(),
    createServiceVisitor(),
    createMessageVisitor(),
    createRpcVisitor(),
  ]
}
