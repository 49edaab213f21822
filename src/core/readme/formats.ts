import type { FormatId } from '../../types/index.js';
import { UnknownFormatError } from '../../utils/errors.js';
import { podToHtml } from '../pod/pod-html.js';
import { podToGfm, podToMarkdown } from '../pod/pod-markdown.js';
import { podToText } from '../pod/pod-text.js';

/**
 * A README flavour: its default file name and a pure POD converter.
 */
export interface FormatSpec {
  readonly id: FormatId;
  readonly outputFilename: string;
  convert(markup: string): string;
}

const FORMATS: Readonly<Record<FormatId, FormatSpec>> = Object.freeze({
  pod: { id: 'pod', outputFilename: 'README.pod', convert: (markup: string) => markup },
  text: { id: 'text', outputFilename: 'README', convert: podToText },
  markdown: { id: 'markdown', outputFilename: 'README.mkdn', convert: podToMarkdown },
  gfm: { id: 'gfm', outputFilename: 'README.md', convert: podToGfm },
  html: { id: 'html', outputFilename: 'README.html', convert: podToHtml }
});

const FORMAT_IDS: readonly FormatId[] = Object.freeze(['pod', 'text', 'markdown', 'gfm', 'html']);

export function allFormatIds(): readonly FormatId[] {
  return FORMAT_IDS;
}

export function isFormatId(value: string): value is FormatId {
  return FORMAT_IDS.some(id => id === value);
}

export function lookupFormat(id: string): FormatSpec {
  if (!isFormatId(id)) {
    throw new UnknownFormatError(id, FORMAT_IDS);
  }
  return FORMATS[id];
}
