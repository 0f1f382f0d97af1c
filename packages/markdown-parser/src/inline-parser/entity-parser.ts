import { decodeEntity } from "@/parser-helpers"
import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

const ENTITY_HERE = /&(?:#[xX][0-9a-fA-F]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{1,31});/

export class EntityParser implements InlineParser {
  readonly characters = ["&"]

  parse(context: InlineParserContext): boolean {
    const { cursor } = context
    const state = cursor.saveState()
    const entity = cursor.match(ENTITY_HERE)
    if (entity === null) return false

    const decoded = decodeEntity(entity)
    if (decoded === null) {
      cursor.restoreState(state)
      return false
    }
    context.appendText(decoded)
    return true
  }
}
