import { Delimiter } from "@/delimiter/delimiter"
import type { InlineParserContext } from "@/inline-parser/context"
import { isLeftFlankingDelimiterRun, isRightFlankingDelimiterRun } from "@/parser-helpers"
import type { InlineParser } from "@/plugin-system"

export const DOUBLE_QUOTE = "\""
export const SINGLE_QUOTE = "'"

/** Pushes each straight quote as its own one-character delimiter. */
export class QuoteParser implements InlineParser {
  readonly characters = [DOUBLE_QUOTE, SINGLE_QUOTE]

  parse(context: InlineParserContext): boolean {
    const { cursor } = context
    const char = cursor.getCharacter()
    if (char === null) return false

    const before = cursor.peek(-1) ?? "\n"
    cursor.advance()
    const after = cursor.getCharacter() ?? "\n"

    const leftFlanking = isLeftFlankingDelimiterRun(before, after)
    const rightFlanking = isRightFlankingDelimiterRun(before, after)

    const node = context.appendText(char, { delim: true, quote: true })
    context.delimiters.push(
      new Delimiter({ char, length: 1, node, canOpen: leftFlanking && !rightFlanking, canClose: rightFlanking }),
    )
    return true
  }
}
