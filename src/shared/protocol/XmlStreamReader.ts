import { EventEmitter } from 'events';
import { parser as createSaxParser, SAXParser } from 'sax';
import { StringDecoder } from 'string_decoder';
import { ClientErrorCode, ProtocolError } from '../errors';
import { XmlNode } from './XmlNode';

interface NodeDraft {
  name: string;
  content: string;
  attributes: Map<string, string>;
  children: XmlNode[];
}

export interface XmlStreamReader {
  on(event: 'node', listener: (node: XmlNode) => void): this;
  on(event: 'end', listener: () => void): this;
  on(event: 'error', listener: (error: ProtocolError) => void): this;
  once(event: 'node', listener: (node: XmlNode) => void): this;
  once(event: 'end', listener: () => void): this;
  once(event: 'error', listener: (error: ProtocolError) => void): this;
}

/**
 * Incremental reader for the server's XML stream.
 *
 * The stream is one long-lived root element (`<protocol>`). Every complete
 * element directly below the root is emitted as a `node` event as soon as
 * its closing tag arrives; closing the root emits `end`. Malformed input
 * emits a single `error`, after which further chunks are ignored.
 *
 * Events:
 * - `node` (node: XmlNode)
 * - `end` ()
 * - `error` (error: ProtocolError)
 */
export class XmlStreamReader extends EventEmitter {
  private readonly parser: SAXParser;
  // Socket chunks may end inside a multi-byte character.
  private readonly decoder = new StringDecoder('utf8');
  private readonly stack: NodeDraft[] = [];
  private rootName: string | null = null;
  private failed = false;

  constructor() {
    super();
    this.parser = createSaxParser(true, { trim: true });

    this.parser.onopentag = (tag) => {
      const attributes = new Map<string, string>();
      for (const [key, value] of Object.entries(tag.attributes)) {
        attributes.set(key, typeof value === 'string' ? value : value.value);
      }
      if (this.rootName === null) {
        this.rootName = tag.name;
      }
      this.stack.push({ name: tag.name, content: '', attributes, children: [] });
    };

    this.parser.ontext = (text) => this.appendText(text);
    this.parser.oncdata = (text) => this.appendText(text);

    this.parser.onclosetag = () => {
      const draft = this.stack.pop();
      if (!draft) return;

      const node = new XmlNode(draft.name, draft.content, draft.attributes, draft.children);
      const parent = this.stack[this.stack.length - 1];
      if (!parent) {
        this.emit('end');
        return;
      }
      if (this.stack.length === 1) {
        this.emit('node', node);
      } else {
        parent.children.push(node);
      }
    };

    // sax keeps going after an error within the same chunk; report only the first.
    this.parser.onerror = (error) => {
      if (this.failed) return;
      this.failed = true;
      this.emit(
        'error',
        new ProtocolError(ClientErrorCode.PROTOCOL_MALFORMED_XML, `Malformed XML: ${error.message}`, {
          line: this.parser.line,
          column: this.parser.column,
        })
      );
    };
  }

  /** Name of the root element once it has been opened. */
  get root(): string | null {
    return this.rootName;
  }

  write(chunk: string | Buffer): void {
    if (this.failed) return;
    this.parser.write(typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
  }

  private appendText(text: string): void {
    const current = this.stack[this.stack.length - 1];
    if (current) {
      current.content += text;
    }
  }
}
