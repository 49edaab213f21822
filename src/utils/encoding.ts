import { EncodingError, InvalidConfigurationError } from './errors.js';

/** Declared encoding meaning "no transcoding": one code unit per byte. */
export const RAW_ENCODING = 'raw';
export const DEFAULT_ENCODING = 'UTF-8';

const ENCODING_ALIASES: Record<string, BufferEncoding> = {
  'raw': 'latin1',
  'bytes': 'latin1',
  'utf8': 'utf8',
  'utf-8': 'utf8',
  'utf-8-strict': 'utf8',
  'latin1': 'latin1',
  'latin-1': 'latin1',
  'iso-8859-1': 'latin1',
  'iso8859-1': 'latin1',
  'ascii': 'ascii',
  'us-ascii': 'ascii',
  'utf16le': 'utf16le',
  'utf-16le': 'utf16le',
  'ucs2': 'utf16le',
  'ucs-2': 'utf16le'
};

/**
 * Map a declared text encoding name onto a Node buffer encoding.
 */
export function toBufferEncoding(declared: string | undefined): BufferEncoding {
  if (declared === undefined) {
    return 'utf8';
  }
  const encoding = ENCODING_ALIASES[declared.trim().toLowerCase()];
  if (!encoding) {
    throw new InvalidConfigurationError(`Unsupported text encoding '${declared}'`, { encoding: declared });
  }
  return encoding;
}

const SINGLE_BYTE_LIMITS: Partial<Record<BufferEncoding, number>> = {
  latin1: 0xff,
  ascii: 0x7f
};

function codePointLabel(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Encode `text` for writing. Single-byte encodings refuse characters they
 * cannot hold; `target` names the file in the error.
 */
export function encodeText(text: string, declared: string | undefined, target?: string): Buffer {
  const encoding = toBufferEncoding(declared);
  const limit = SINGLE_BYTE_LIMITS[encoding];
  if (limit !== undefined) {
    for (const char of text) {
      const codePoint = char.codePointAt(0) ?? 0;
      if (codePoint > limit) {
        throw new EncodingError(
          `Wide character ${codePointLabel(codePoint)} cannot be written as ${declared ?? encoding}` +
            (target ? ` to ${target}` : ''),
          { encoding: declared, target, codePoint }
        );
      }
    }
  }
  return Buffer.from(text, encoding);
}

export function decodeBytes(bytes: Buffer, declared: string | undefined): string {
  return bytes.toString(toBufferEncoding(declared));
}
