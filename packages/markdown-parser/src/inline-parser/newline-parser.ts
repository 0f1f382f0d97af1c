import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

/**
 * A line ending inside a paragraph. Two or more trailing spaces before it
 * make a hard break; otherwise it is soft.
 */
export class NewlineParser implements InlineParser {
  readonly characters = ["\n"]

  parse(context: InlineParserContext): boolean {
    const { cursor, tree } = context
    cursor.advance()

    let hardBreak = false
    const last = context.lastChild()
    if (tree.isText(last)) {
      const content = tree.literal(last) ?? ""
      const trimmed = content.replace(/ +$/, "")
      if (trimmed !== content) {
        tree.setLiteral(last, trimmed)
        hardBreak = content.length - trimmed.length >= 2
      }
    }

    context.append(tree.create({ kind: hardBreak ? "linebreak" : "softbreak" }))

    // leading spaces on the next line are not content
    cursor.match(/ */)
    return true
  }
}
