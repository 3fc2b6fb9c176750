import sax from 'sax';
import type { QualifiedTag, Tag } from 'sax';

import { XmlParseError, createDebugLogger, errorMessage } from '@licensekit/types';

import { XmlCData, XmlComment, XmlElement } from './tree';

const dbg = createDebugLogger('licensekit:xml');

function attributesOf(tag: Tag | QualifiedTag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, attr] of Object.entries(tag.attributes)) {
    out[name] = typeof attr === 'string' ? attr : attr.value;
  }
  return out;
}

const ATTRIBUTE_NAME = /\s([^\s=]+)\s*=\s*(?:"[^"]*"|'[^']*')/g;

/** First attribute name that occurs twice in a well-formed start tag. */
function repeatedAttribute(rawTag: string): string | undefined {
  const seen = new Set<string>();
  for (const match of rawTag.matchAll(ATTRIBUTE_NAME)) {
    const name = match[1];
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return undefined;
}

/**
 * Parse a single-rooted XML document into an element tree.
 *
 * - entities and character references are decoded;
 * - whitespace between child elements is dropped, text-only content is kept
 *   as written;
 * - the XML declaration and processing instructions are skipped;
 * - a DOCTYPE and repeated attributes are refused.
 *
 * @throws {XmlParseError} When the text is not well formed.
 */
export function parseXml(text: string): XmlElement {
  const parser = sax.parser(true, { trim: false, normalize: false, position: true });
  const stack: XmlElement[] = [];
  let root: XmlElement | undefined;
  let cdata: string | undefined;

  const fail = (message: string): never => {
    throw new XmlParseError(message, { line: parser.line + 1, column: parser.column + 1 });
  };

  parser.onerror = (err: Error): void => {
    fail(err.message.split('\n')[0] ?? 'Malformed XML');
  };

  parser.ondoctype = (): void => {
    fail('DOCTYPE declarations are not allowed');
  };

  parser.onopentag = (tag: Tag | QualifiedTag): void => {
    // sax drops a repeated attribute before any event sees it, so read the raw tag.
    const duplicate = repeatedAttribute(text.slice(parser.startTagPosition - 1, parser.position));
    if (duplicate !== undefined) {
      fail(`Duplicate attribute "${duplicate}" on <${tag.name}>`);
    }
    const element = new XmlElement(tag.name, { attributes: attributesOf(tag), empty: tag.isSelfClosing });
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.append(element);
    } else if (root) {
      fail(`Unexpected second root element <${tag.name}>`);
    } else {
      root = element;
    }
    stack.push(element);
  };

  parser.onclosetag = (): void => {
    stack.pop()?.dropIndentation();
  };

  parser.ontext = (chunk: string): void => {
    // Whitespace outside the root is allowed; sax rejects anything else.
    stack[stack.length - 1]?.append(chunk);
  };

  parser.onopencdata = (): void => {
    cdata = '';
  };

  parser.oncdata = (chunk: string): void => {
    cdata = (cdata ?? '') + chunk;
  };

  parser.onclosecdata = (): void => {
    stack[stack.length - 1]?.append(new XmlCData(cdata ?? ''));
    cdata = undefined;
  };

  parser.oncomment = (comment: string): void => {
    stack[stack.length - 1]?.append(new XmlComment(comment));
  };

  try {
    parser.write(text).close();
  } catch (err) {
    if (err instanceof XmlParseError) {
      dbg.warn('parse failed', err.message, err.context);
      throw err;
    }
    throw new XmlParseError(`Malformed XML: ${errorMessage(err)}`, undefined, { cause: err });
  }

  if (!root) {
    throw new XmlParseError('Document has no root element');
  }
  if (stack.length > 0) {
    throw new XmlParseError(`Unclosed element <${stack[stack.length - 1]?.name ?? root.name}>`);
  }
  return root;
}
