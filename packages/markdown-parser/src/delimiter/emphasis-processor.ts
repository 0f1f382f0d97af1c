import type { NodeId, NodeTree } from "@/node-tree"
import type { Delimiter } from "./delimiter"
import type { DelimiterProcessor } from "./types"

/**
 * Pairs `*` and `_` runs into emphasis (one character from each side) or
 * strong emphasis (two).
 */
export class EmphasisDelimiterProcessor implements DelimiterProcessor {
  readonly openingCharacter: string
  readonly closingCharacter: string
  readonly minLength = 1

  constructor(char: string) {
    this.openingCharacter = char
    this.closingCharacter = char
  }

  getDelimiterUse(opener: Delimiter, closer: Delimiter): number {
    if (!isRuleOfThreeCompatible(opener, closer)) return 0

    return opener.length >= 2 && closer.length >= 2 ? 2 : 1
  }

  process(tree: NodeTree, opener: NodeId, closer: NodeId, delimiterUse: number) {
    if (delimiterUse !== 1 && delimiterUse !== 2) return
    const wrapper = tree.create({ kind: delimiterUse === 1 ? "emphasis" : "strong" })
    tree.wrapBetween(opener, closer, wrapper)
  }
}

/**
 * When either side can both open and close, the two original run lengths
 * must not sum to a multiple of 3 unless both are multiples of 3.
 */
export function isRuleOfThreeCompatible(opener: Delimiter, closer: Delimiter): boolean {
  if (!(opener.canClose || closer.canOpen)) return true
  const sum = opener.originalLength + closer.originalLength
  if (sum % 3 !== 0) return true
  return opener.originalLength % 3 === 0 && closer.originalLength % 3 === 0
}
