import { decodeBytes, DEFAULT_ENCODING, encodeText } from '../../utils/encoding.js';

export type FileChangeListener = (file: BuildFile) => void;

/**
 * A file destined for the build. Files gathered from disk keep their bytes
 * and are decoded with `encoding` only when `content` is read; the bytes are
 * written back untouched unless the content was replaced.
 */
export class BuildFile {
  private text?: string;
  private encoded?: Buffer;
  private readonly listeners: FileChangeListener[] = [];

  constructor(
    public readonly name: string,
    content: string | Buffer,
    public readonly encoding: string = DEFAULT_ENCODING,
    /** Plugin or step that added the file */
    public readonly addedBy = 'unknown'
  ) {
    if (typeof content === 'string') {
      this.text = content;
    } else {
      this.encoded = content;
    }
  }

  get content(): string {
    if (this.text === undefined) {
      this.text = decodeBytes(this.encoded ?? Buffer.alloc(0), this.encoding);
    }
    return this.text;
  }

  /**
   * Bytes to write: the original ones while the content is untouched.
   */
  toBytes(): Buffer {
    return this.encoded ?? encodeText(this.content, this.encoding, this.name);
  }

  /**
   * Replace the content. Listeners fire only when the text actually changes.
   */
  setContent(content: string): void {
    if (content === this.content) {
      return;
    }
    this.text = content;
    this.encoded = undefined;
    for (const listener of [...this.listeners]) {
      listener(this);
    }
  }

  onChange(listener: FileChangeListener): void {
    this.listeners.push(listener);
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}

/**
 * Ordered, name-addressed set of the files in a build.
 */
export class BuildFileSet {
  private readonly files: BuildFile[] = [];

  list(): readonly BuildFile[] {
    return [...this.files];
  }

  find(name: string): BuildFile | undefined {
    return this.files.find(file => file.name === name);
  }

  insert(file: BuildFile): void {
    this.files.push(file);
  }

  remove(file: BuildFile): boolean {
    const index = this.files.indexOf(file);
    if (index < 0) {
      return false;
    }
    this.files.splice(index, 1);
    return true;
  }

  get size(): number {
    return this.files.length;
  }
}
