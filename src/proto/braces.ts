/**
 * Count of `{` minus count of `}` in `text`
 */
export function braceBalance(text: string): number {
  let balance = 0
  for (const ch of text) {
    if (ch === '{') balance++
    else if (ch === '}') balance--
  }
  return balance
}
