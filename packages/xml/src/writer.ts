import { assertNever } from '@licensekit/types';

import type { XmlElement, XmlNode } from './tree';

export interface WriteOptions {
  /**
   * Indent nested elements. Off by default: the compact form is the one
   * signatures are computed over.
   */
  pretty?: boolean;
  /** Indentation unit when `pretty` is set. Defaults to two spaces. */
  indent?: string;
}

const TEXT_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '\r': '&#xD;',
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\t': '&#x9;',
  '\n': '&#xA;',
  '\r': '&#xD;',
};

export function escapeText(text: string): string {
  return text.replace(/[&<>\r]/g, (ch) => TEXT_ESCAPES[ch] ?? ch);
}

export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\t\n\r]/g, (ch) => ATTRIBUTE_ESCAPES[ch] ?? ch);
}

function openTag(element: XmlElement): string {
  let out = `<${element.name}`;
  for (const attr of element.attributes) {
    out += ` ${attr.name}="${escapeAttribute(attr.value)}"`;
  }
  return out;
}

function writeCompact(node: XmlNode): string {
  switch (node.kind) {
    case 'text':
      return escapeText(node.text);
    case 'cdata':
      return `<![CDATA[${node.text}]]>`;
    case 'comment':
      return `<!--${node.text}-->`;
    case 'element': {
      if (node.isEmpty) {
        return `${openTag(node)} />`;
      }
      return `${openTag(node)}>${node.nodes.map(writeCompact).join('')}</${node.name}>`;
    }
    default:
      return assertNever(node);
  }
}

function writePretty(node: XmlNode, depth: number, unit: string): string {
  const pad = unit.repeat(depth);
  if (node.kind !== 'element') {
    return pad + writeCompact(node);
  }
  // Only element-bearing content loses its indentation on re-parse.
  const inline = node.isEmpty
    || !node.nodes.some((child) => child.kind === 'element')
    || node.nodes.some((child) => child.kind === 'text' || child.kind === 'cdata');
  if (inline) {
    return pad + writeCompact(node);
  }
  const inner = node.nodes.map((child) => writePretty(child, depth + 1, unit)).join('\n');
  return `${pad}${openTag(node)}>\n${inner}\n${pad}</${node.name}>`;
}

/**
 * Serialize an element.
 *
 * Compact output has no whitespace between tags: `<a x="1"><b>t</b><c /></a>`.
 * Pretty output puts each child element of element-only content on its own
 * line; elements holding text stay on one line, so re-parsing pretty output
 * gives back the compact form.
 */
export function writeXml(element: XmlElement, options?: WriteOptions): string {
  if (options?.pretty) {
    return writePretty(element, 0, options.indent ?? '  ');
  }
  return writeCompact(element);
}
