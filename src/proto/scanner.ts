/**
 * Line Scanner
 *
 * Turns definition text into Line records and exposes them through a
 * pull-based LineSource.
 */

import { Errors } from '../errors/index.js'
import type { Line, LineSource, LineToken } from './types.js'

/**
 * Classify a statement by its last character
 */
export function tokenFor(syntax: string): LineToken {
  switch (syntax.charAt(syntax.length - 1)) {
    case ';':
      return 'semicolon'
    case '{':
      return 'open-brace'
    case '}':
      return 'close-brace'
    default:
      return 'none'
  }
}

/**
 * Build a Line in memory, inferring the token from its syntax
 */
export function line(syntax: string, token: LineToken = tokenFor(syntax), comment?: string): Line {
  return {
    syntax,
    token,
    number: 0,
    ...(comment !== undefined && { comment }),
  }
}

interface SplitLine {
  code: string
  comments: string[]
}

function cleanBlockComment(text: string): string {
  return text.trim().replace(/^\*+\s?/, '').trim()
}

/**
 * Split the code of one physical line from its comments. Comment markers
 * inside quoted strings are kept as code.
 */
function splitLine(raw: string, state: { inBlock: boolean }): SplitLine {
  let code = ''
  let block = ''
  let quote: string | undefined
  const comments: string[] = []

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i)
    const next = raw.charAt(i + 1)

    if (state.inBlock) {
      if (ch === '*' && next === '/') {
        state.inBlock = false
        const text = cleanBlockComment(block)
        if (text) comments.push(text)
        block = ''
        i++
      } else {
        block += ch
      }
      continue
    }

    if (quote) {
      code += ch
      if (ch === '\\' && i + 1 < raw.length) {
        code += next
        i++
      } else if (ch === quote) {
        quote = undefined
      }
      continue
    }

    if (ch === '"' || ch === "'") {
      quote = ch
      code += ch
    } else if (ch === '/' && next === '/') {
      const text = raw.slice(i + 2).trim()
      if (text) comments.push(text)
      break
    } else if (ch === '/' && next === '*') {
      state.inBlock = true
      i++
    } else {
      code += ch
    }
  }

  if (state.inBlock) {
    const text = cleanBlockComment(block)
    if (text) comments.push(text)
  }

  return { code, comments }
}

/**
 * Tokenize definition text into lines.
 *
 * Blank lines and comment-only lines are not emitted. Comment-only lines are
 * attached to the next statement; a blank line discards them.
 */
export function tokenizeLines(content: string): Line[] {
  const lines: Line[] = []
  const state = { inBlock: false }
  let pending: string[] = []

  content.split(/\r?\n/).forEach((raw, index) => {
    const wasInBlock = state.inBlock
    const { code, comments } = splitLine(raw, state)
    const syntax = code.trim()

    if (!syntax) {
      if (!wasInBlock && comments.length === 0 && !raw.trim()) {
        pending = []
      } else {
        pending.push(...comments)
      }
      return
    }

    const all = [...pending, ...comments]
    pending = []
    lines.push({
      syntax,
      token: tokenFor(syntax),
      number: index + 1,
      ...(all.length > 0 && { comment: all.join('\n') }),
    })
  })

  return lines
}

/**
 * LineSource over a fixed list of lines
 */
export function createArrayLineSource(lines: readonly Line[]): LineSource {
  let position = 0

  return {
    scan(): boolean {
      return position < lines.length
    },

    readLine(): Line {
      if (position >= lines.length) {
        const last = lines.length > 0 ? lines[lines.length - 1].number : 0
        throw Errors.endOfInput(last)
      }
      return lines[position++]
    },
  }
}

/**
 * LineSource over definition text
 */
export function createLineScanner(content: string): LineSource {
  return createArrayLineSource(tokenizeLines(content))
}
