import { Delimiter } from "@/delimiter/delimiter"
import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

/** `![` opens an image; a lone `!` is left to plain text. */
export class BangParser implements InlineParser {
  readonly characters = ["!"]

  parse(context: InlineParserContext): boolean {
    const { cursor, delimiters } = context
    if (cursor.peek() !== "[") return false

    cursor.advanceBy(2)
    const node = context.appendText("![", { delim: true })
    delimiters.push(
      new Delimiter({ char: "!", length: 1, node, canOpen: true, canClose: false, index: cursor.position }),
    )
    return true
  }
}
