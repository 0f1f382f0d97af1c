import type { InlineParserContext } from "@/inline-parser/context"
import type { InlineParser } from "@/plugin-system"
import { Mention } from "./mention"
import type { MentionGeneratorFunction } from "./mention-generator"

const WORD_CHARACTER = /\w/

export class MentionParser implements InlineParser {
  readonly characters: readonly string[]
  private readonly pattern: RegExp

  constructor(
    readonly name: string,
    readonly prefix: string,
    pattern: string,
    private readonly generator: MentionGeneratorFunction,
  ) {
    this.characters = [prefix.charAt(0)]
    this.pattern = new RegExp(pattern, "i")
  }

  parse(context: InlineParserContext): boolean {
    const { cursor, tree } = context

    // the prefix must not be glued to a preceding word (e-mail addresses)
    const previous = cursor.peek(-1)
    if (previous !== null && WORD_CHARACTER.test(previous)) return false
    if (!cursor.getRemainder().startsWith(this.prefix)) return false

    const previousState = cursor.saveState()
    cursor.advanceBy(this.prefix.length)

    const identifier = cursor.match(this.pattern)
    if (identifier === null || identifier === "") {
      cursor.restoreState(previousState)
      return false
    }

    const mention = this.generator(new Mention(this.name, this.prefix, identifier))
    if (mention === null) {
      cursor.restoreState(previousState)
      return false
    }

    const node = tree.create({
      kind: "mention",
      name: mention.name,
      prefix: mention.prefix,
      identifier: mention.identifier,
      url: mention.url,
    })
    tree.appendChild(node, tree.createText(mention.label))
    context.append(node)
    return true
  }
}
