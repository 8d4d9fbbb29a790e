import { ClientErrorCode, ProtocolError } from '../errors';

/**
 * In-memory tree of a single XML element. Attribute order is insertion
 * order, which `toXml` preserves.
 */
export class XmlNode {
  readonly name: string;
  readonly content: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: readonly XmlNode[];

  constructor(
    name: string,
    content: string = '',
    attributes: ReadonlyMap<string, string> = new Map(),
    children: readonly XmlNode[] = []
  ) {
    this.name = name;
    this.content = content;
    this.attributes = attributes;
    this.children = children;
  }

  static builder(name: string): XmlNodeBuilder {
    return new XmlNodeBuilder(name);
  }

  /**
   * @throws ProtocolError when the attribute is missing
   */
  attribute(key: string): string {
    const value = this.attributes.get(key);
    if (value === undefined) {
      throw new ProtocolError(
        ClientErrorCode.PROTOCOL_MISSING_ATTRIBUTE,
        `No attribute with key '${key}' found in <${this.name}>!`,
        { node: this.name, key }
      );
    }
    return value;
  }

  optionalAttribute(key: string): string | undefined {
    return this.attributes.get(key);
  }

  /**
   * First child with the given tag name.
   *
   * @throws ProtocolError when there is none
   */
  child(name: string): XmlNode {
    const found = this.children.find((c) => c.name === name);
    if (!found) {
      throw new ProtocolError(
        ClientErrorCode.PROTOCOL_MISSING_CHILD,
        `No <${name}> found in <${this.name}>!`,
        { node: this.name, child: name }
      );
    }
    return found;
  }

  optionalChild(name: string): XmlNode | undefined {
    return this.children.find((c) => c.name === name);
  }

  childrenNamed(name: string): XmlNode[] {
    return this.children.filter((c) => c.name === name);
  }

  /**
   * Serializes the element without an XML declaration. Elements without
   * content or children are self-closing.
   */
  toXml(): string {
    let attrs = '';
    for (const [key, value] of this.attributes) {
      attrs += ` ${key}="${escapeXml(value)}"`;
    }

    if (this.content.length === 0 && this.children.length === 0) {
      return `<${this.name}${attrs}/>`;
    }

    const inner = escapeXml(this.content) + this.children.map((c) => c.toXml()).join('');
    return `<${this.name}${attrs}>${inner}</${this.name}>`;
  }

  toString(): string {
    return this.toXml();
  }
}

/**
 * Fluent construction of {@link XmlNode}s.
 *
 * ```typescript
 * const node = XmlNode.builder('join').attribute('gameType', 'swc_2020_hive').build();
 * ```
 */
export class XmlNodeBuilder {
  private tagName: string;
  private text = '';
  private readonly attrs = new Map<string, string>();
  private readonly kids: XmlNode[] = [];

  constructor(name: string) {
    this.tagName = name;
  }

  name(name: string): this {
    this.tagName = name;
    return this;
  }

  content(content: string): this {
    this.text = content;
    return this;
  }

  attribute(key: string, value: string | number | boolean): this {
    this.attrs.set(key, String(value));
    return this;
  }

  attributes(entries: Iterable<[string, string]>): this {
    for (const [key, value] of entries) {
      this.attrs.set(key, value);
    }
    return this;
  }

  child(child: XmlNode | XmlNodeBuilder): this {
    this.kids.push(child instanceof XmlNodeBuilder ? child.build() : child);
    return this;
  }

  children(children: Iterable<XmlNode>): this {
    this.kids.push(...children);
    return this;
  }

  build(): XmlNode {
    return new XmlNode(this.tagName, this.text, new Map(this.attrs), [...this.kids]);
  }
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => XML_ESCAPES[c] ?? c);
}
