import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

/**
 * Code spans. The closing run must have exactly as many backticks as the
 * opening one; an unmatched run is literal text.
 */
export class BacktickParser implements InlineParser {
  readonly characters = ["`"]

  parse(context: InlineParserContext): boolean {
    const { cursor, tree } = context
    const ticks = cursor.match(/`+/)
    if (ticks === null) return false

    const afterOpenTicks = cursor.position
    const text = cursor.getLine()
    const closing = /`+/g
    closing.lastIndex = afterOpenTicks

    let match: RegExpExecArray | null
    while ((match = closing.exec(text)) !== null) {
      if (match[0] !== ticks) continue

      let code = text.slice(afterOpenTicks, match.index).replace(/\n/g, " ")
      if (code.startsWith(" ") && code.endsWith(" ") && /[^ ]/.test(code)) {
        code = code.slice(1, -1)
      }
      cursor.advanceBy(match.index + ticks.length - afterOpenTicks)
      context.append(tree.create({ kind: "code_span", literal: code }))
      return true
    }

    context.appendText(ticks)
    return true
  }
}
