/**
 * RPC Visitor
 *
 * Recognizes `rpc Name(In) returns (Out)` declarations and, when the
 * declaration opens a block, scans that block for option statements.
 *
 * Malformed input never throws. An option that is never terminated ends at
 * the next line starting an `rpc`, `message` or `service`; that line is
 * handed back as `reinspect` so the caller can dispatch it.
 */

import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { braceBalance } from './braces.js'
import {
  addInputParameter,
  addOutputParameter,
  addRpcOption,
  createParameter,
  createRpc,
  createRpcOption,
  scopePath,
} from './entities.js'
import type { Line, LineSource, Parameter, Rpc, VisitResult } from './types.js'
import type { Visitor } from './visitor.js'

const log = createLogger('rpc-visitor')

export const RPC_LINE_PATTERN = /^\s*rpc\s+(\w+)\s*\(\s*([^)]+)\s*\)\s+returns\s*\(\s*([^)]+)\s*\)(.*)/

const STREAM_PREFIX = /^stream\s+/
const OPTION_KEYWORD = /^option\b/
const CONSTRUCT_START = /^(rpc|message|service)\s/

/**
 * Captured parts of a declaration line
 */
export interface RpcDeclarationMatch {
  name: string
  /** Raw input argument text */
  inArgs: string
  /** Raw output argument text */
  outArgs: string
  /** Everything after the closing parenthesis of the output arguments */
  trailer: string
}

export function matchRpcDeclaration(syntax: string): RpcDeclarationMatch | undefined {
  const match = RPC_LINE_PATTERN.exec(syntax)
  if (!match) {
    return undefined
  }

  const [, name, inArgs, outArgs, trailer] = match
  return { name, inArgs, outArgs, trailer }
}

/**
 * Parse a comma-separated argument list. Segments are not validated.
 */
export function parseParameters(raw: string): Parameter[] {
  return raw.split(',').map((segment) => {
    const trimmed = segment.trim()
    if (STREAM_PREFIX.test(trimmed)) {
      return createParameter(true, trimmed.replace(STREAM_PREFIX, '').trim())
    }
    return createParameter(false, trimmed)
  })
}

/**
 * `option (a.b).c = ...` names `a.b`; `option deprecated = true;` names `deprecated`
 */
function optionNameOf(syntax: string): string {
  const equals = syntax.indexOf('=')
  const open = syntax.indexOf('(')
  const close = open >= 0 ? syntax.indexOf(')', open + 1) : -1

  if (open >= 0 && close > open && (equals < 0 || open < equals)) {
    return syntax.slice(open + 1, close)
  }

  return syntax.slice('option'.length, equals >= 0 ? equals : undefined).trim()
}

interface AccumulatedOption {
  name: string
  body: string
  /** Set when accumulation stopped on the start of another construct */
  reinspect?: Line
}

/**
 * AccumulatingOption: gather an option body until its statement ends at
 * brace depth zero.
 */
function accumulateOption(source: LineSource, first: Line): AccumulatedOption {
  const syntax = first.syntax.trim()
  const name = optionNameOf(syntax)
  const equals = syntax.indexOf('=')
  let body = equals >= 0 ? syntax.slice(equals + 1).trim() : ''
  let depth = braceBalance(body)

  if (first.token === 'semicolon' && depth === 0) {
    return { name, body }
  }

  while (source.scan()) {
    const next = source.readLine()
    const trimmed = next.syntax.trim()

    if (CONSTRUCT_START.test(trimmed)) {
      return { name, body, reinspect: next }
    }

    if (trimmed === ';') {
      break
    }

    body = body ? `${body} ${trimmed}` : trimmed
    depth += braceBalance(trimmed)

    if (next.token === 'semicolon' && depth === 0) {
      break
    }
  }

  return { name, body }
}

/**
 * ScanningBlock: consume the RPC's block until it closes, input ends, or an
 * option runs into the next construct. Returns that construct's first line.
 */
function scanBlock(source: LineSource, rpc: Rpc): Line | undefined {
  const scope = scopePath(rpc.namespace, rpc.name)

  while (source.scan()) {
    const line = source.readLine()

    if (line.token === 'close-brace') {
      return undefined
    }

    if (!OPTION_KEYWORD.test(line.syntax.trimStart())) {
      continue
    }

    const option = accumulateOption(source, line)
    if (option.body.trim()) {
      addRpcOption(rpc, createRpcOption(scope, option.name, option.body))
    }

    if (option.reinspect) {
      return option.reinspect
    }
  }

  return undefined
}

/**
 * Create an RPC visitor. Visitors hold no state between visits.
 */
export function createRpcVisitor(): Visitor<'rpc'> {
  return {
    kind: 'rpc',

    canVisit(line: Line): boolean {
      return RPC_LINE_PATTERN.test(line.syntax)
    },

    visit(source: LineSource, line: Line, namespace: string): VisitResult<Rpc> {
      log.debug({ line: line.number, syntax: line.syntax }, 'Visiting RPC')

      const declaration = matchRpcDeclaration(line.syntax)
      if (!declaration) {
        throw Errors.unexpectedLine('rpc', line.number, line.syntax)
      }

      const rpc = createRpc(namespace, declaration.name, line.comment)
      for (const parameter of parseParameters(declaration.inArgs)) {
        addInputParameter(rpc, parameter)
      }
      for (const parameter of parseParameters(declaration.outArgs)) {
        addOutputParameter(rpc, parameter)
      }

      // `;` ends a block-less declaration, `{}` an empty block on the same line
      if (line.token === 'semicolon' || line.token === 'close-brace') {
        return { entity: rpc }
      }

      const reinspect = scanBlock(source, rpc)
      if (reinspect) {
        log.debug(
          { rpc: rpc.name, line: reinspect.number },
          'Option block ended by next declaration'
        )
        return { entity: rpc, reinspect }
      }

      return { entity: rpc }
    },
  }
}
