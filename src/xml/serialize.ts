import { XML_BASELINE_INDENT } from "../core/config.js";
import type { XmlDocument, XmlElementNode, XmlNode } from "../core/types.js";
import { resolveCharset } from "./charset.js";

type CanEncode = (char: string) => boolean;

const TEXT_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\r": "&#13;",
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  ...TEXT_ESCAPES,
  '"': "&quot;",
  "\n": "&#10;",
  "\t": "&#9;",
};

const escapeWith = (value: string, escapes: Record<string, string>, canEncode: CanEncode): string => {
  let out = "";
  for (const char of value) {
    const escaped = escapes[char];
    if (escaped !== undefined) {
      out += escaped;
    } else if (canEncode(char)) {
      out += char;
    } else {
      out += `&#${char.codePointAt(0)};`;
    }
  }
  return out;
};

/** Elements with a text or CDATA child keep their content inline. */
const isMixed = (element: XmlElementNode): boolean =>
  element.children.some((child) => child.kind === "text" || child.kind === "cdata");

const renderNode = (node: XmlNode, depth: number, pretty: boolean, canEncode: CanEncode): string => {
  switch (node.kind) {
    case "text":
      return escapeWith(node.value, TEXT_ESCAPES, canEncode);
    case "cdata":
      return `<![CDATA[${node.value}]]>`;
    case "comment":
      return `<!--${node.value}-->`;
    case "pi":
      return node.body ? `<?${node.target} ${node.body}?>` : `<?${node.target}?>`;
    case "element":
      return renderElement(node, depth, pretty, canEncode);
  }
};

const renderElement = (
  element: XmlElementNode,
  depth: number,
  pretty: boolean,
  canEncode: CanEncode
): string => {
  const attributes = element.attributes
    .map(([name, value]) => ` ${name}="${escapeWith(value, ATTRIBUTE_ESCAPES, canEncode)}"`)
    .join("");
  const open = `<${element.name}${attributes}`;
  if (element.children.length === 0) {
    return `${open}/>`;
  }
  const close = `</${element.name}>`;
  if (!pretty || isMixed(element)) {
    const inline = element.children.map((child) => renderNode(child, depth + 1, false, canEncode));
    return `${open}>${inline.join("")}${close}`;
  }
  const childIndent = XML_BASELINE_INDENT.repeat(depth + 1);
  const lines = element.children.map(
    (child) => `${childIndent}${renderNode(child, depth + 1, true, canEncode)}`
  );
  return `${open}>\n${lines.join("\n")}\n${XML_BASELINE_INDENT.repeat(depth)}${close}`;
};

const renderDeclaration = (doc: XmlDocument): string => {
  const standalone = doc.declaration.standalone ? ` standalone='${doc.declaration.standalone}'` : "";
  return `<?xml version='${doc.declaration.version}' encoding='${doc.encoding}'${standalone}?>`;
};

/**
 * Writes the document with a fixed two-space indent per level.
 */
export const serializeXml = (doc: XmlDocument): string => {
  const { canEncode } = resolveCharset(doc.encoding);
  const lines: string[] = [];
  if (doc.hasDeclaration) {
    lines.push(renderDeclaration(doc));
  }
  if (doc.doctype !== null) {
    lines.push(`<!DOCTYPE ${doc.doctype}>`);
  }
  for (const node of doc.prolog) {
    lines.push(renderNode(node, 0, true, canEncode));
  }
  lines.push(renderElement(doc.root, 0, true, canEncode));
  for (const node of doc.epilog) {
    lines.push(renderNode(node, 0, true, canEncode));
  }
  return lines.join("\n");
};
