import type { ReferenceMap } from "./reference-map"

export interface RefDefinition {
  label: string
  url: string
  title: string
}

type NodeBase<T extends string> = { type: T }
type NodeWithChildren<T extends string, U extends InlineNode[]> = NodeBase<T> & { children: U }
type NodeWithValue<T extends string> = NodeBase<T> & { value: string }
type NodeWithCode<T extends string> = NodeBase<T> & { code: string }

export type DocumentNode = NodeBase<"document"> & {
  children: ParagraphNode[]
  refDefinitions: ReferenceMap
}

export type ParagraphNode = NodeWithChildren<"paragraph", InlineNode[]> & { _raw?: string }

export type TextNode = NodeWithValue<"text">
export type CodeSpanNode = NodeWithCode<"code_span">
export type SoftBreakNode = NodeBase<"softbreak">
export type LineBreakNode = NodeBase<"linebreak">
export type RawHtmlNode = NodeBase<"raw_html"> & { content: string }
export type EmphasisNode = NodeWithChildren<"emphasis", InlineNode[]>
export type StrongNode = NodeWithChildren<"strong", InlineNode[]>
export type StrikethroughNode = NodeWithChildren<"strikethrough", InlineNode[]>
export type LinkNode = NodeWithChildren<"link", InlineNode[]> & { url: string; title: string }
export type ImageNode = NodeBase<"image"> & { url: string; title: string; alt: string }
export type MentionNode = NodeWithChildren<"mention", InlineNode[]> & {
  name: string
  prefix: string
  identifier: string
  url: string
}

export type InlineNode =
  | TextNode
  | CodeSpanNode
  | SoftBreakNode
  | LineBreakNode
  | RawHtmlNode
  | EmphasisNode
  | StrongNode
  | StrikethroughNode
  | LinkNode
  | ImageNode
  | MentionNode

export type MarkdownNode = DocumentNode | ParagraphNode | InlineNode
