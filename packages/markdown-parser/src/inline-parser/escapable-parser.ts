import { isEscapable } from "@/parser-helpers"
import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

/** Backslash escapes, plus the backslash hard line break. */
export class EscapableParser implements InlineParser {
  readonly characters = ["\\"]

  parse(context: InlineParserContext): boolean {
    const { cursor, tree } = context
    cursor.advance()

    const next = cursor.getCharacter()
    if (next === "\n") {
      cursor.advance()
      context.append(tree.create({ kind: "linebreak" }))
    } else if (next !== null && isEscapable(next)) {
      cursor.advance()
      context.appendText(next)
    } else {
      context.appendText("\\")
    }
    return true
  }
}
