import { encodeText } from '../../utils/encoding.js';
import { SourceNotFoundError } from '../../utils/errors.js';
import type { BuildFile, BuildFileSet } from '../build/file-set.js';
import { extractPod } from '../pod/pod-extract.js';
import type { FormatSpec } from './formats.js';

/**
 * Source content as of the last time markup was extracted from it.
 */
export interface SourceSnapshot {
  lastSeenContent: string;
}

export function createSourceSnapshot(): SourceSnapshot {
  return { lastSeenContent: '' };
}

/**
 * Record `sourceContent` in the snapshot and return its POD, merged in source order.
 */
export function extractMarkup(sourceContent: string, snapshot: SourceSnapshot): string {
  snapshot.lastSeenContent = sourceContent;
  return extractPod(sourceContent);
}

export function convertMarkup(markup: string, format: FormatSpec): string {
  return format.convert(markup);
}

/**
 * Convert and encode for writing to disk with the source file's declared encoding.
 */
export function render(markup: string, format: FormatSpec, encoding: string | undefined, target?: string): Buffer {
  return encodeText(convertMarkup(markup, format), encoding, target);
}

export interface ReadmeContent {
  text: string;
  encoding: string;
}

/**
 * Reads one source file out of the build and turns its POD into README text.
 */
export class ContentPipeline {
  constructor(
    private readonly files: BuildFileSet,
    private readonly sourceFilename: string,
    private readonly format: FormatSpec,
    readonly snapshot: SourceSnapshot = createSourceSnapshot()
  ) {}

  sourceFile(): BuildFile {
    const file = this.files.find(this.sourceFilename);
    if (!file) {
      throw new SourceNotFoundError(this.sourceFilename);
    }
    return file;
  }

  /**
   * Whether the source changed since markup was last extracted from it.
   */
  isStale(): boolean {
    return this.sourceFile().content !== this.snapshot.lastSeenContent;
  }

  generate(): ReadmeContent {
    const source = this.sourceFile();
    const markup = extractMarkup(source.content, this.snapshot);
    return { text: convertMarkup(markup, this.format), encoding: source.encoding };
  }

  /**
   * Generated text encoded like the source; `target` names the output in encoding errors.
   */
  generateBytes(target?: string): Buffer {
    const { text, encoding } = this.generate();
    return encodeText(text, encoding, target);
  }
}
