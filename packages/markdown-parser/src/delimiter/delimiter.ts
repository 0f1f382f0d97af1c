import type { NodeId } from "@/node-tree"

export interface DelimiterInit {
  char: string
  length: number
  node: NodeId
  canOpen: boolean
  canClose: boolean
  index?: number | null
}

/**
 * One pending emphasis run or bracket opener. `node` is the placeholder text
 * node that holds the run's characters until it is paired or left literal.
 */
export class Delimiter {
  readonly char: string
  readonly originalLength: number
  readonly node: NodeId
  readonly canOpen: boolean
  readonly canClose: boolean
  /** Offset just past the opener in the cursor text; used for shortcut reference labels. */
  readonly index: number | null
  length: number
  previous: Delimiter | null = null
  next: Delimiter | null = null
  inStack = false
  private activeFlag = true

  constructor(init: DelimiterInit) {
    this.char = init.char
    this.length = init.length
    this.originalLength = init.length
    this.node = init.node
    this.canOpen = init.canOpen
    this.canClose = init.canClose
    this.index = init.index ?? null
  }

  get active(): boolean {
    return this.activeFlag
  }

  deactivate() {
    this.activeFlag = false
  }
}
