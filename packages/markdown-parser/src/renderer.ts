import type { InlineNode, MarkdownNode } from "./ast";

export function renderAstToHtml(node: MarkdownNode): string {
  switch (node.type) {
    case "document":
      return node.children.map((c) => renderAstToHtml(c)).join("");
    case "paragraph":
      return `<p>${renderChildren(node.children)}</p>\n`;
    case "text":
      return escapeHtml(node.value);
    case "emphasis":
      return `<em>${renderChildren(node.children)}</em>`;
    case "strong":
      return `<strong>${renderChildren(node.children)}</strong>`;
    case "strikethrough":
      return `<del>${renderChildren(node.children)}</del>`;
    case "code_span":
      return `<code>${escapeHtml(node.code)}</code>`;
    case "softbreak":
      return "\n";
    case "linebreak":
      return "<br />\n";
    case "raw_html":
      return node.content;
    case "link":
      return renderLink(node.url, node.title, node.children);
    case "mention":
      // a mention whose generator set no URL renders as its label only
      return node.url ? renderLink(node.url, "", node.children) : renderChildren(node.children);
    case "image": {
      const t = node.title ? ` title="${escapeHtmlAttr(node.title)}"` : "";
      return `<img src="${escapeUrl(node.url)}" alt="${escapeHtmlAttr(node.alt)}"${t} />`;
    }
  }
}

function renderChildren(children: InlineNode[]): string {
  return children.map((c) => renderAstToHtml(c)).join("");
}

function renderLink(url: string, title: string, children: InlineNode[]): string {
  const t = title ? ` title="${escapeHtmlAttr(title)}"` : "";
  return `<a href="${escapeUrl(url)}"${t}>${renderChildren(children)}</a>`;
}

export function escapeHtml(str: string) {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function escapeHtmlAttr(str: string) {
  return escapeHtml(str);
}

export function escapeUrl(str: string) {
  return escapeHtml(str);
}
