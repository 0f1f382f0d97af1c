import type { Delimiter } from "@/delimiter/delimiter"
import type { DelimiterProcessor } from "@/delimiter/types"
import type { NodeId, NodeTree } from "@/node-tree"
import type { MarkdownPlugin } from "@/plugin-system"

/** `~text~` and `~~text~~`; both runs must be the same length. */
export class StrikethroughDelimiterProcessor implements DelimiterProcessor {
  readonly openingCharacter = "~"
  readonly closingCharacter = "~"
  readonly minLength = 1

  getDelimiterUse(opener: Delimiter, closer: Delimiter): number {
    if (opener.length > 2 && closer.length > 2) return 0
    if (opener.length !== closer.length) return 0
    return Math.min(opener.length, closer.length)
  }

  process(tree: NodeTree, opener: NodeId, closer: NodeId) {
    tree.wrapBetween(opener, closer, tree.create({ kind: "strikethrough" }))
  }
}

export const strikethroughPlugin: MarkdownPlugin = {
  name: "strikethrough",
  register(environment) {
    environment.addDelimiterProcessor(new StrikethroughDelimiterProcessor())
  },
}
