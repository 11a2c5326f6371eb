/**
 * Service Visitor
 *
 * Collects the RPCs declared in a `service` block. RPCs are scoped to
 * `<namespace>.<Service>`.
 */

import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { braceBalance } from './braces.js'
import { createRpcVisitor } from './rpc-visitor.js'
import type { Line, LineSource, ProtoService, VisitResult } from './types.js'
import type { Visitor } from './visitor.js'

const log = createLogger('service-visitor')

const SERVICE_PATTERN = /^\s*service\s+(\w+)/

/**
 * Namespace given to the RPCs of a service
 */
export function serviceNamespace(namespace: string, service: string): string {
  return namespace ? `${namespace}.${service}` : service
}

export function createServiceVisitor(): Visitor<'service'> {
  return {
    kind: 'service',

    canVisit(line: Line): boolean {
      return SERVICE_PATTERN.test(line.syntax)
    },

    visit(source: LineSource, line: Line, namespace: string): VisitResult<ProtoService> {
      const match = SERVICE_PATTERN.exec(line.syntax)
      if (!match) {
        throw Errors.unexpectedLine('service', line.number, line.syntax)
      }

      const service: ProtoService = {
        namespace,
        name: match[1],
        ...(line.comment !== undefined && { comment: line.comment }),
        rpcs: [],
      }
      log.debug({ line: line.number, service: service.name }, 'Visiting service')

      if (line.token === 'close-brace' || line.token === 'semicolon') {
        return { entity: service }
      }

      if (line.token === 'none') {
        // Opening brace on the following line
        if (!source.scan()) {
          return { entity: service }
        }
        const brace = source.readLine()
        if (!brace.syntax.trimStart().startsWith('{')) {
          return { entity: service, reinspect: brace }
        }
        if (braceBalance(brace.syntax) <= 0) {
          return { entity: service }
        }
      }

      const rpcs = createRpcVisitor()
      const scope = serviceNamespace(namespace, service.name)
      // Depth of non-rpc content such as service options; below zero the service is closed
      let depth = 0
      let pending: Line | undefined

      while (pending !== undefined || source.scan()) {
        const next = pending ?? source.readLine()
        pending = undefined

        if (rpcs.canVisit(next)) {
          const result = rpcs.visit(source, next, scope)
          service.rpcs.push(result.entity)

          if (result.reinspect !== undefined) {
            if (!rpcs.canVisit(result.reinspect)) {
              // message or service: this service was closed implicitly
              return { entity: service, reinspect: result.reinspect }
            }
            pending = result.reinspect
          }
          continue
        }

        depth += braceBalance(next.syntax)
        if (depth < 0) {
          return { entity: service }
        }
      }

      return { entity: service }
    },
  }
}
