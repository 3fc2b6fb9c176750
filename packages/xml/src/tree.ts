/**
 * A small mutable element tree, shaped after the needs of signed documents:
 * attribute order is kept, and an element remembers whether it was written
 * self-closing (`<a />`) or with an explicit empty body (`<a></a>`), since
 * the two produce different signed bytes.
 *
 * @packageDocumentation
 */

/** Character data. */
export class XmlText {
  readonly kind = 'text';

  constructor(readonly text: string) {}
}

/** A CDATA section, written back verbatim. */
export class XmlCData {
  readonly kind = 'cdata';

  constructor(readonly text: string) {}
}

/** A comment. */
export class XmlComment {
  readonly kind = 'comment';

  constructor(readonly text: string) {}
}

export type XmlNode = XmlElement | XmlText | XmlCData | XmlComment;

export interface XmlAttribute {
  readonly name: string;
  readonly value: string;
}

export interface XmlElementInit {
  /** Attributes in document order. */
  attributes?: Record<string, string> | readonly XmlAttribute[];
  /** Child nodes; strings become text nodes. */
  children?: ReadonlyArray<XmlNode | string>;
  /**
   * Whether a childless element is written self-closing. Defaults to true
   * when there are no children.
   */
  empty?: boolean;
}

function isAttributeList(
  attributes: Record<string, string> | readonly XmlAttribute[],
): attributes is readonly XmlAttribute[] {
  return Array.isArray(attributes);
}

function toNode(child: XmlNode | string): XmlNode {
  return typeof child === 'string' ? new XmlText(child) : child;
}

/**
 * An element. Children are owned: appending an element that already has a
 * parent moves it.
 */
export class XmlElement {
  readonly kind = 'element';
  readonly name: string;

  private attrs: XmlAttribute[] = [];
  private children: XmlNode[] = [];
  private empty: boolean;
  private owner: XmlElement | undefined;

  constructor(name: string, init?: XmlElementInit) {
    this.name = name;
    const attributes = init?.attributes;
    if (attributes) {
      const list: readonly XmlAttribute[] = isAttributeList(attributes)
        ? attributes
        : Object.entries(attributes).map(([n, value]) => ({ name: n, value }));
      for (const attr of list) {
        this.setAttribute(attr.name, attr.value);
      }
    }
    const children = init?.children ?? [];
    this.empty = init?.empty ?? children.length === 0;
    if (children.length > 0) {
      this.append(...children);
    }
  }

  /** Create `<name>text</name>`. */
  static withText(name: string, text: string, attributes?: Record<string, string>): XmlElement {
    return new XmlElement(name, { attributes }).setValue(text);
  }

  get parent(): XmlElement | undefined {
    return this.owner;
  }

  get attributes(): readonly XmlAttribute[] {
    return this.attrs;
  }

  get nodes(): readonly XmlNode[] {
    return this.children;
  }

  /** True when the element has no content and is written as `<name />`. */
  get isEmpty(): boolean {
    return this.empty;
  }

  /** Concatenated text of all descendants. */
  get value(): string {
    let out = '';
    for (const child of this.children) {
      if (child.kind === 'element') {
        out += child.value;
      } else if (child.kind !== 'comment') {
        out += child.text;
      }
    }
    return out;
  }

  attribute(name: string): string | undefined {
    return this.attrs.find((a) => a.name === name)?.value;
  }

  /** Set an attribute, keeping its position when it already exists. */
  setAttribute(name: string, value: string): this {
    const index = this.attrs.findIndex((a) => a.name === name);
    if (index >= 0) {
      this.attrs[index] = { name, value };
    } else {
      this.attrs.push({ name, value });
    }
    return this;
  }

  /** First direct child element named `name`. */
  element(name: string): XmlElement | undefined {
    for (const child of this.children) {
      if (child.kind === 'element' && child.name === name) {
        return child;
      }
    }
    return undefined;
  }

  /** Direct child elements, optionally filtered by name. */
  elements(name?: string): XmlElement[] {
    const out: XmlElement[] = [];
    for (const child of this.children) {
      if (child.kind === 'element' && (name === undefined || child.name === name)) {
        out.push(child);
      }
    }
    return out;
  }

  /** Replace all content with a single text node (none for ''). */
  setValue(text: string): this {
    this.detachChildren();
    this.children = text.length > 0 ? [new XmlText(text)] : [];
    this.empty = false;
    return this;
  }

  /** Append nodes. Adjacent text is merged. */
  append(...nodes: ReadonlyArray<XmlNode | string>): this {
    for (const raw of nodes) {
      const node = toNode(raw);
      if (node.kind === 'element') {
        node.owner?.remove(node);
        node.owner = this;
        this.children.push(node);
      } else {
        const last = this.children[this.children.length - 1];
        if (node.kind === 'text' && last !== undefined && last.kind === 'text') {
          this.children[this.children.length - 1] = new XmlText(last.text + node.text);
        } else {
          this.children.push(node);
        }
      }
      this.empty = false;
    }
    return this;
  }

  /** Remove a direct child. Returns whether it was found. */
  remove(node: XmlNode): boolean {
    const index = this.children.indexOf(node);
    if (index < 0) {
      return false;
    }
    this.children.splice(index, 1);
    if (node.kind === 'element') {
      node.owner = undefined;
    }
    return true;
  }

  /**
   * Drop whitespace-only text nodes when the element has element children,
   * i.e. indentation between tags. Text-only content is left untouched.
   */
  dropIndentation(): this {
    if (this.children.some((c) => c.kind === 'element')) {
      this.children = this.children.filter((c) => c.kind !== 'text' || c.text.trim().length > 0);
    }
    return this;
  }

  /** Deep copy without a parent. */
  clone(): XmlElement {
    const copy = new XmlElement(this.name, { attributes: this.attrs, empty: this.empty });
    for (const child of this.children) {
      copy.children.push(child.kind === 'element' ? child.clone() : child);
    }
    for (const child of copy.children) {
      if (child.kind === 'element') {
        child.owner = copy;
      }
    }
    return copy;
  }

  private detachChildren(): void {
    for (const child of this.children) {
      if (child.kind === 'element') {
        child.owner = undefined;
      }
    }
  }
}
