import { isDebugMode, logDebug } from "@/debug"
import type { NodeTree } from "@/node-tree"
import type { Delimiter } from "./delimiter"
import type { DelimiterProcessorLookup } from "./types"

export class DelimiterStack {
  private top: Delimiter | null = null

  constructor(private readonly tree: NodeTree) {}

  getTop(): Delimiter | null {
    return this.top
  }

  size(): number {
    let count = 0
    for (let d = this.top; d !== null; d = d.previous) count++
    return count
  }

  *[Symbol.iterator](): IterableIterator<Delimiter> {
    let bottom = this.top
    while (bottom?.previous) bottom = bottom.previous
    for (let d = bottom; d !== null; d = d.next) yield d
  }

  push(delimiter: Delimiter) {
    delimiter.previous = this.top
    delimiter.next = null
    if (this.top) this.top.next = delimiter
    this.top = delimiter
    delimiter.inStack = true
  }

  searchByCharacter(characters: string | readonly string[]): Delimiter | null {
    const wanted = typeof characters === "string" ? [characters] : characters
    for (let d = this.top; d !== null; d = d.previous) {
      if (wanted.includes(d.char)) return d
    }
    return null
  }

  removeDelimiter(delimiter: Delimiter) {
    if (!delimiter.inStack) return
    if (delimiter.previous) delimiter.previous.next = delimiter.next
    if (delimiter.next) {
      delimiter.next.previous = delimiter.previous
    } else {
      this.top = delimiter.previous
    }
    delimiter.previous = null
    delimiter.next = null
    delimiter.inStack = false
  }

  removeDelimiterAndNode(delimiter: Delimiter) {
    this.tree.detach(delimiter.node)
    this.removeDelimiter(delimiter)
  }

  removeDelimitersBetween(opener: Delimiter, closer: Delimiter) {
    let d = closer.previous
    while (d !== null && d !== opener) {
      const previous: Delimiter | null = d.previous
      this.removeDelimiter(d)
      d = previous
    }
  }

  /** Pops every delimiter above `stackBottom` (everything when it is null). */
  removeAll(stackBottom: Delimiter | null = null) {
    while (this.top && this.top !== stackBottom) {
      this.removeDelimiter(this.top)
    }
  }

  /** Deactivates every delimiter with the given character; no links inside links. */
  removeEarlierMatches(character: string) {
    for (let d = this.top; d !== null; d = d.previous) {
      if (d.char === character) d.deactivate()
    }
  }

  processDelimiters(stackBottom: Delimiter | null, processors: DelimiterProcessorLookup) {
    const openersBottom = new Map<string, Delimiter | null>()

    let closer = this.top
    while (closer !== null && closer.previous !== stackBottom) {
      closer = closer.previous
    }

    while (closer !== null) {
      const processor = processors.getDelimiterProcessor(closer.char)
      if (!closer.canClose || !processor || processor.closingCharacter !== closer.char) {
        closer = closer.next
        continue
      }

      const bottomKey = `${closer.char}:${closer.canOpen ? 1 : 0}:${closer.originalLength % 3}`
      const hasBottom = openersBottom.has(bottomKey)
      const openerBottom = openersBottom.get(bottomKey) ?? null

      let delimiterUse = 0
      let openerFound = false
      let potentialOpenerFound = false
      let opener = closer.previous
      while (opener !== null && opener !== stackBottom && !(hasBottom && opener === openerBottom)) {
        if (opener.canOpen && opener.char === processor.openingCharacter) {
          potentialOpenerFound = true
          delimiterUse = processor.getDelimiterUse(opener, closer)
          if (delimiterUse > 0) {
            openerFound = true
            break
          }
        }
        opener = opener.previous
      }

      if (!openerFound || opener === null) {
        if (!potentialOpenerFound) {
          openersBottom.set(bottomKey, closer.previous)
          if (!closer.canOpen) {
            const following: Delimiter | null = closer.next
            this.removeDelimiter(closer)
            closer = following
            continue
          }
        }
        closer = closer.next
        continue
      }

      if (isDebugMode()) {
        logDebug(`Pairing "${opener.char}" x${delimiterUse} (opener ${opener.length}, closer ${closer.length})`)
      }

      opener.length -= delimiterUse
      closer.length -= delimiterUse
      this.shrinkLiteral(opener, delimiterUse)
      this.shrinkLiteral(closer, delimiterUse)

      this.removeDelimitersBetween(opener, closer)
      this.tree.mergeTextNodesBetweenExclusive(opener.node, closer.node)
      processor.process(this.tree, opener.node, closer.node, delimiterUse)

      if (opener.length === 0) {
        this.removeDelimiterAndNode(opener)
      }
      if (closer.length === 0) {
        const following: Delimiter | null = closer.next
        this.removeDelimiterAndNode(closer)
        closer = following
      }
    }

    this.removeAll(stackBottom)
  }

  private shrinkLiteral(delimiter: Delimiter, used: number) {
    const literal = this.tree.literal(delimiter.node) ?? ""
    this.tree.setLiteral(delimiter.node, literal.slice(0, Math.max(0, literal.length - used)))
  }
}
