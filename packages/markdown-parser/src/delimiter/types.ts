import type { NodeId, NodeTree } from "@/node-tree"
import type { Delimiter } from "./delimiter"

export interface DelimiterProcessor {
  readonly openingCharacter: string
  readonly closingCharacter: string
  /** Shortest run that is pushed onto the stack at all. */
  readonly minLength: number

  /** Number of characters to use from each side; 0 means the pair is not allowed. */
  getDelimiterUse(opener: Delimiter, closer: Delimiter): number

  /** Wraps the nodes strictly between the two placeholders. */
  process(tree: NodeTree, opener: NodeId, closer: NodeId, delimiterUse: number): void
}

export interface DelimiterProcessorLookup {
  getDelimiterProcessor(char: string): DelimiterProcessor | undefined
}
