import type { DelimiterProcessor } from "@/delimiter/types"
import type { NodeId, NodeTree } from "@/node-tree"

/** Turns a matched pair of straight quotes into the configured curly ones. */
export class QuoteProcessor implements DelimiterProcessor {
  readonly minLength = 1
  readonly openingCharacter: string
  readonly closingCharacter: string

  constructor(
    char: string,
    private readonly openerCharacter: string,
    private readonly closerCharacter: string,
  ) {
    this.openingCharacter = char
    this.closingCharacter = char
  }

  getDelimiterUse(): number {
    return 1
  }

  process(tree: NodeTree, opener: NodeId, closer: NodeId) {
    tree.insertAfter(opener, tree.createText(this.openerCharacter, { quote: true }))
    tree.insertBefore(closer, tree.createText(this.closerCharacter, { quote: true }))
  }
}
