/**
 * Proto Parser
 *
 * Drives the dispatcher over a definition file and folds each visited
 * construct into a ProtoDocument.
 */

import { readFile } from 'node:fs/promises'
import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { createDefaultVisitors, createDispatcher } from './dispatcher.js'
import { resolveParserOptions, type ParserOptionsInput } from './options.js'
import { createArrayLineSource, tokenizeLines } from './scanner.js'
import type { Line, ProtoDocument, Rpc } from './types.js'

const log = createLogger('parser')

function withoutComment(line: Line): Line {
  return { syntax: line.syntax, token: line.token, number: line.number }
}

/**
 * Parse definition text.
 *
 * @param content - Definition file content
 * @param options - Parser options (validated)
 * @returns Every service, message and RPC found, in source order
 */
export function parseProto(content: string, options: ParserOptionsInput = {}): ProtoDocument {
  const config = resolveParserOptions(options)
  const lines = tokenizeLines(content)
  const source = createArrayLineSource(config.includeComments ? lines : lines.map(withoutComment))
  const dispatcher = createDispatcher(createDefaultVisitors())

  const document: ProtoDocument = {
    imports: [],
    services: [],
    messages: [],
    rpcs: [],
  }

  let namespace = config.defaultNamespace
  let pending: Line | undefined

  while (pending !== undefined || source.scan()) {
    const line = pending ?? source.readLine()
    pending = undefined

    const visited = dispatcher.dispatch(source, line, namespace)
    if (!visited) {
      log.trace({ line: line.number, syntax: line.syntax }, 'Skipping unclaimed line')
      continue
    }

    // A visitor that stopped on the start of another construct hands it back
    pending = visited.result.reinspect

    switch (visited.kind) {
      case 'syntax':
        document.syntax = visited.result.entity
        break
      case 'package':
        document.package = visited.result.entity
        namespace = visited.result.entity
        break
      case 'import':
        document.imports.push(visited.result.entity)
        break
      case 'service':
        document.services.push(visited.result.entity)
        break
      case 'message':
        document.messages.push(visited.result.entity)
        break
      case 'rpc':
        document.rpcs.push(visited.result.entity)
        break
    }
  }

  log.debug(
    {
      lines: lines.length,
      services: document.services.length,
      messages: document.messages.length,
      rpcs: listRpcs(document).length,
    },
    'Parsed definition'
  )

  return document
}

/**
 * Read and parse a definition file (UTF-8).
 */
export async function parseProtoFile(
  path: string,
  options: ParserOptionsInput = {}
): Promise<ProtoDocument> {
  let content: string

  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw Errors.fileNotFound(path)
    }
    throw Errors.readFailed(path, err)
  }

  return parseProto(content, options)
}

/**
 * Every RPC of a document: service RPCs in service order, then top-level ones
 */
export function listRpcs(document: ProtoDocument): Rpc[] {
  return [...document.services.flatMap((service) => service.rpcs), ...document.rpcs]
}
