import type { InlineNode } from "./ast"

export type NodeId = number

export type TreeNodeData =
  | { kind: "container" }
  | { kind: "text"; literal: string; delim: boolean; quote: boolean }
  | { kind: "code_span"; literal: string }
  | { kind: "raw_html"; literal: string }
  | { kind: "softbreak" }
  | { kind: "linebreak" }
  | { kind: "emphasis" }
  | { kind: "strong" }
  | { kind: "strikethrough" }
  | { kind: "link"; url: string; title: string }
  | { kind: "image"; url: string; title: string; label: string }
  | { kind: "mention"; name: string; prefix: string; identifier: string; url: string }

export type TreeNodeKind = TreeNodeData["kind"]

export type StringContainerData = Extract<TreeNodeData, { literal: string }>

interface Slot {
  data: TreeNodeData
  parent: NodeId | null
  firstChild: NodeId | null
  lastChild: NodeId | null
  prev: NodeId | null
  next: NodeId | null
}

/**
 * Arena-backed inline tree. Nodes are addressed by stable integer ids and
 * every structural edit is a constant-time relink of the slot fields.
 */
export class NodeTree {
  private slots: Slot[] = []

  create(data: TreeNodeData): NodeId {
    this.slots.push({ data, parent: null, firstChild: null, lastChild: null, prev: null, next: null })
    return this.slots.length - 1
  }

  createText(literal: string, flags: { delim?: boolean; quote?: boolean } = {}): NodeId {
    return this.create({ kind: "text", literal, delim: !!flags.delim, quote: !!flags.quote })
  }

  get size(): number {
    return this.slots.length
  }

  data(id: NodeId): TreeNodeData {
    return this.slot(id).data
  }

  kind(id: NodeId): TreeNodeKind {
    return this.slot(id).data.kind
  }

  setData(id: NodeId, data: TreeNodeData) {
    this.slot(id).data = data
  }

  parent(id: NodeId): NodeId | null {
    return this.slot(id).parent
  }

  firstChild(id: NodeId): NodeId | null {
    return this.slot(id).firstChild
  }

  lastChild(id: NodeId): NodeId | null {
    return this.slot(id).lastChild
  }

  next(id: NodeId): NodeId | null {
    return this.slot(id).next
  }

  previous(id: NodeId): NodeId | null {
    return this.slot(id).prev
  }

  children(id: NodeId): NodeId[] {
    const result: NodeId[] = []
    for (let child = this.slot(id).firstChild; child !== null; child = this.slot(child).next) {
      result.push(child)
    }
    return result
  }

  /** Literal content of a string container, or null for any other kind. */
  literal(id: NodeId): string | null {
    const data = this.slot(id).data
    return "literal" in data ? data.literal : null
  }

  setLiteral(id: NodeId, literal: string) {
    const data = this.slot(id).data
    if (!("literal" in data)) {
      throw new Error(`Node ${id} of kind "${data.kind}" has no literal content`)
    }
    data.literal = literal
  }

  isText(id: NodeId | null): id is NodeId {
    return id !== null && this.slot(id).data.kind === "text"
  }

  appendChild(parent: NodeId, child: NodeId) {
    this.detach(child)
    const p = this.slot(parent)
    const c = this.slot(child)
    c.parent = parent
    if (p.lastChild === null) {
      p.firstChild = child
      p.lastChild = child
      return
    }
    this.slot(p.lastChild).next = child
    c.prev = p.lastChild
    p.lastChild = child
  }

  insertAfter(sibling: NodeId, node: NodeId) {
    this.detach(node)
    const s = this.slot(sibling)
    const n = this.slot(node)
    n.parent = s.parent
    n.prev = sibling
    n.next = s.next
    if (s.next !== null) {
      this.slot(s.next).prev = node
    } else if (s.parent !== null) {
      this.slot(s.parent).lastChild = node
    }
    s.next = node
  }

  insertBefore(sibling: NodeId, node: NodeId) {
    const previous = this.slot(sibling).prev
    if (previous !== null) {
      this.insertAfter(previous, node)
      return
    }
    this.detach(node)
    const s = this.slot(sibling)
    const n = this.slot(node)
    n.parent = s.parent
    n.next = sibling
    s.prev = node
    if (s.parent !== null) this.slot(s.parent).firstChild = node
  }

  /** Puts `replacement` where `target` was and detaches `target`. */
  replaceWith(target: NodeId, replacement: NodeId) {
    this.insertAfter(target, replacement)
    this.detach(target)
  }

  detach(id: NodeId) {
    const s = this.slot(id)
    if (s.prev !== null) {
      this.slot(s.prev).next = s.next
    } else if (s.parent !== null) {
      this.slot(s.parent).firstChild = s.next
    }
    if (s.next !== null) {
      this.slot(s.next).prev = s.prev
    } else if (s.parent !== null) {
      this.slot(s.parent).lastChild = s.prev
    }
    s.parent = null
    s.prev = null
    s.next = null
  }

  /** Moves every node strictly between `from` and `to` into `wrapper`, which takes their place. */
  wrapBetween(from: NodeId, to: NodeId, wrapper: NodeId) {
    let node = this.slot(from).next
    while (node !== null && node !== to) {
      const following = this.slot(node).next
      this.appendChild(wrapper, node)
      node = following
    }
    this.insertAfter(from, wrapper)
  }

  mergeChildNodes(parent: NodeId) {
    const first = this.slot(parent).firstChild
    const last = this.slot(parent).lastChild
    if (first === null || last === null) return
    this.mergeRange(first, last)
  }

  mergeTextNodesBetweenExclusive(from: NodeId, to: NodeId) {
    const start = this.slot(from).next
    const end = this.slot(to).prev
    if (start === null || end === null || start === to) return
    this.mergeRange(start, end)
  }

  private mergeRange(first: NodeId, last: NodeId) {
    const stop = this.slot(last).next
    let runStart: NodeId | null = null
    let node: NodeId | null = first
    while (node !== null && node !== stop) {
      const following: NodeId | null = this.slot(node).next
      if (this.isMergeableText(node)) {
        if (runStart === null) {
          runStart = node
        } else {
          this.setLiteral(runStart, `${this.literal(runStart) ?? ""}${this.literal(node) ?? ""}`)
          this.detach(node)
        }
      } else {
        runStart = null
      }
      node = following
    }
  }

  private isMergeableText(id: NodeId): boolean {
    const data = this.slot(id).data
    return data.kind === "text" && !data.quote
  }

  /** Concatenated literal text of every descendant string container. */
  textContent(id: NodeId): string {
    let output = ""
    for (const child of this.children(id)) {
      const literal = this.literal(child)
      if (literal !== null) {
        output += literal
      } else {
        const data = this.slot(child).data
        if (data.kind === "image") output += data.label
        else output += this.textContent(child)
      }
    }
    return output
  }

  /** Converts the children of `root` into plain AST nodes. */
  materialize(root: NodeId): InlineNode[] {
    const result: InlineNode[] = []
    for (const child of this.children(root)) {
      const node = this.toAstNode(child)
      if (node) result.push(node)
    }
    return result
  }

  private toAstNode(id: NodeId): InlineNode | null {
    const data = this.slot(id).data
    switch (data.kind) {
      case "text":
        return data.literal === "" ? null : { type: "text", value: data.literal }
      case "code_span":
        return { type: "code_span", code: data.literal }
      case "raw_html":
        return { type: "raw_html", content: data.literal }
      case "softbreak":
        return { type: "softbreak" }
      case "linebreak":
        return { type: "linebreak" }
      case "emphasis":
      case "strong":
      case "strikethrough":
        return { type: data.kind, children: this.materialize(id) }
      case "link":
        return { type: "link", url: data.url, title: data.title, children: this.materialize(id) }
      case "image":
        return { type: "image", url: data.url, title: data.title, alt: data.label }
      case "mention":
        return {
          type: "mention",
          name: data.name,
          prefix: data.prefix,
          identifier: data.identifier,
          url: data.url,
          children: this.materialize(id),
        }
      case "container":
        return null
    }
  }

  private slot(id: NodeId): Slot {
    const s = this.slots[id]
    if (!s) throw new RangeError(`Unknown node id ${id}`)
    return s
  }
}
