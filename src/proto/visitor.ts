/**
 * Visitor Contract
 *
 * A visitor claims lines that start one kind of construct and consumes the
 * rest of that construct from the shared line source.
 */

import type {
  Line,
  LineSource,
  ProtoMessage,
  ProtoService,
  Rpc,
  VisitResult,
} from './types.js'

/**
 * Entity produced for each construct kind
 */
export interface ConstructEntities {
  syntax: string
  package: string
  import: string
  service: ProtoService
  message: ProtoMessage
  rpc: Rpc
}

export type ConstructKind = keyof ConstructEntities

export interface Visitor<K extends ConstructKind> {
  readonly kind: K
  /** Whether `line` starts this construct. Pure. */
  canVisit(line: Line): boolean
  /** Build the construct, pulling further lines from `source` as needed */
  visit(source: LineSource, line: Line, namespace: string): VisitResult<ConstructEntities[K]>
}

export type AnyVisitor = { [K in ConstructKind]: Visitor<K> }[ConstructKind]

/**
 * Result of a dispatch, tagged with the kind of construct it came from
 */
export type Visited = {
  [K in ConstructKind]: { kind: K; result: VisitResult<ConstructEntities[K]> }
}[ConstructKind]
