/**
 * Parser Options
 *
 * Validated with zod; invalid options raise INVALID_ARGUMENT.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'

export const parserOptionsSchema = z
  .object({
    /** Namespace used until a `package` statement sets one */
    defaultNamespace: z.string().default(''),
    /** Keep comments on services, messages and RPCs */
    includeComments: z.boolean().default(true),
  })
  .strict()

export type ParserOptions = z.infer<typeof parserOptionsSchema>
export type ParserOptionsInput = z.input<typeof parserOptionsSchema>

export function resolveParserOptions(input: unknown = {}): ParserOptions {
  const parsed = parserOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw Errors.invalidOptions(
      parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.') || 'root',
        message: issue.message,
      }))
    )
  }
  return parsed.data
}
