import { Delimiter } from "@/delimiter/delimiter"
import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

/** Pushes a `[` opener for the close bracket parser to resolve. */
export class OpenBracketParser implements InlineParser {
  readonly characters = ["["]

  parse(context: InlineParserContext): boolean {
    const { cursor, delimiters } = context
    cursor.advance()
    const node = context.appendText("[", { delim: true })
    delimiters.push(
      new Delimiter({ char: "[", length: 1, node, canOpen: true, canClose: false, index: cursor.position }),
    )
    return true
  }
}
