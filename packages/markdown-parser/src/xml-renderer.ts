import type { DocumentNode, MarkdownNode } from "./ast";

const INDENT = "    ";
const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>';
const COMMONMARK_NAMESPACE = "http://commonmark.org/xml/1.0";

/** Renders a document in the CommonMark XML format, one element per line. */
export function renderAstToXml(doc: DocumentNode): string {
  const out = [XML_HEADER];
  if (doc.children.length === 0) {
    out.push(`<document xmlns="${COMMONMARK_NAMESPACE}" />`);
  } else {
    out.push(`<document xmlns="${COMMONMARK_NAMESPACE}">`);
    for (const child of doc.children) renderNode(child, 1, out);
    out.push("</document>");
  }
  return `${out.join("\n")}\n`;
}

function renderNode(node: MarkdownNode, depth: number, out: string[]) {
  const indent = INDENT.repeat(depth);
  switch (node.type) {
    case "document":
      out.push(renderAstToXml(node).trimEnd());
      return;
    case "paragraph":
      return renderContainer("paragraph", {}, node.children, depth, out);
    case "text":
      out.push(`${indent}<text>${escapeXml(node.value)}</text>`);
      return;
    case "code_span":
      out.push(`${indent}<code>${escapeXml(node.code)}</code>`);
      return;
    case "raw_html":
      out.push(`${indent}<html_inline>${escapeXml(node.content)}</html_inline>`);
      return;
    case "softbreak":
    case "linebreak":
      out.push(`${indent}<${node.type} />`);
      return;
    case "emphasis":
      return renderContainer("emph", {}, node.children, depth, out);
    case "strong":
    case "strikethrough":
      return renderContainer(node.type, {}, node.children, depth, out);
    case "link":
      return renderContainer("link", { destination: node.url, title: node.title }, node.children, depth, out);
    case "mention":
      if (node.url) {
        return renderContainer("link", { destination: node.url, title: "" }, node.children, depth, out);
      }
      for (const child of node.children) renderNode(child, depth, out);
      return;
    case "image": {
      const alt: MarkdownNode[] = node.alt ? [{ type: "text", value: node.alt }] : [];
      return renderContainer("image", { destination: node.url, title: node.title }, alt, depth, out);
    }
  }
}

function renderContainer(
  name: string,
  attributes: Record<string, string>,
  children: MarkdownNode[],
  depth: number,
  out: string[],
) {
  const indent = INDENT.repeat(depth);
  const attrs = Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${escapeXml(value, true)}"`)
    .join("");
  if (children.length === 0) {
    out.push(`${indent}<${name}${attrs} />`);
    return;
  }
  out.push(`${indent}<${name}${attrs}>`);
  for (const child of children) renderNode(child, depth + 1, out);
  out.push(`${indent}</${name}>`);
}

export function escapeXml(str: string, inAttribute = false): string {
  const escaped = str.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
  return inAttribute ? escaped.replace(/"/g, "&quot;") : escaped;
}
