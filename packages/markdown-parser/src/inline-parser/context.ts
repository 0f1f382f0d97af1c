import { Cursor } from "@/cursor"
import { DelimiterStack } from "@/delimiter/delimiter-stack"
import { NodeTree, type NodeId } from "@/node-tree"
import type { Environment } from "@/plugin-system"
import type { ReferenceLookup } from "@/reference-map"

/**
 * State shared by every inline parser while one text span is consumed. A
 * context is never reused across spans.
 */
export class InlineParserContext {
  readonly cursor: Cursor
  readonly tree = new NodeTree()
  readonly container: NodeId
  readonly delimiters: DelimiterStack

  constructor(
    text: string,
    readonly referenceMap: ReferenceLookup,
    readonly environment: Environment,
  ) {
    this.cursor = new Cursor(text)
    this.container = this.tree.create({ kind: "container" })
    this.delimiters = new DelimiterStack(this.tree)
  }

  /** Appends a node as the last child of the span's container. */
  append(node: NodeId): NodeId {
    this.tree.appendChild(this.container, node)
    return node
  }

  appendText(literal: string, flags: { delim?: boolean; quote?: boolean } = {}): NodeId {
    return this.append(this.tree.createText(literal, flags))
  }

  lastChild(): NodeId | null {
    return this.tree.lastChild(this.container)
  }
}
