/**
 * Message Visitor
 *
 * Records `message` declarations and skips their bodies, nested messages,
 * enums and oneofs included.
 */

import { Errors } from '../errors/index.js'
import { braceBalance } from './braces.js'
import type { Line, LineSource, ProtoMessage, VisitResult } from './types.js'
import type { Visitor } from './visitor.js'

const MESSAGE_PATTERN = /^\s*message\s+(\w+)/
const SERVICE_START = /^\s*service\s/

export function createMessageVisitor(): Visitor<'message'> {
  return {
    kind: 'message',

    canVisit(line: Line): boolean {
      return MESSAGE_PATTERN.test(line.syntax)
    },

    visit(source: LineSource, line: Line, namespace: string): VisitResult<ProtoMessage> {
      const match = MESSAGE_PATTERN.exec(line.syntax)
      if (!match) {
        throw Errors.unexpectedLine('message', line.number, line.syntax)
      }

      const message: ProtoMessage = {
        namespace,
        name: match[1],
        ...(line.comment !== undefined && { comment: line.comment }),
      }

      let depth = braceBalance(line.syntax)
      // Brace on the following line
      if (depth === 0 && line.token === 'none') {
        if (!source.scan()) {
          return { entity: message }
        }
        const next = source.readLine()
        if (!next.syntax.trimStart().startsWith('{')) {
          return { entity: message, reinspect: next }
        }
        depth = braceBalance(next.syntax)
      }

      while (depth > 0 && source.scan()) {
        const next = source.readLine()

        // A service cannot live in a message: the message was never closed
        if (SERVICE_START.test(next.syntax)) {
          return { entity: message, reinspect: next }
        }

        depth += braceBalance(next.syntax)
      }

      return { entity: message }
    },
  }
}
