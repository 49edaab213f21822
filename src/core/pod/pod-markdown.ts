import { toMarkdown } from 'mdast-util-to-markdown';
import { gfmToMarkdown } from 'mdast-util-gfm';
import { podToMdast } from './pod-mdast.js';

const MARKDOWN_RAW_FORMATS = ['markdown', 'html'] as const;

/**
 * Plain Markdown: indented code blocks, `-` bullets, ATX headings.
 */
export function podToMarkdown(pod: string): string {
  const tree = podToMdast(pod, { rawFormats: MARKDOWN_RAW_FORMATS });
  return toMarkdown(tree, { bullet: '-', fences: false });
}

/**
 * GitHub-flavoured Markdown: fenced code blocks plus the GFM serializer
 * extensions (autolink literals, strikethrough, tables, task lists).
 */
export function podToGfm(pod: string): string {
  const tree = podToMdast(pod, { rawFormats: MARKDOWN_RAW_FORMATS });
  return toMarkdown(tree, { bullet: '-', fences: true, extensions: [gfmToMarkdown()] });
}
