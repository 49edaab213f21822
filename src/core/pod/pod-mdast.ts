import type { BlockContent, Heading, List, ListItem, PhrasingContent, Root, RootContent } from 'mdast';
import { POD_PAGE_URL_PREFIX } from '../../constants/index.js';
import { inlineToPlainText, type PodInline, type PodLinkTarget } from './pod-inline.js';
import { parsePod, type PodBlock } from './pod-parser.js';

/**
 * POD → mdast. `rawFormats` names the `=begin`/`=for` formats whose content
 * passes through untouched as raw `html` nodes.
 */
export interface PodToMdastOptions {
  rawFormats: readonly string[];
}

function sectionFragment(section: string): string {
  return encodeURIComponent(section.trim().replace(/\s+/g, '-'));
}

export function linkUrl(target: PodLinkTarget): string {
  if (target.kind === 'url') {
    return target.url;
  }
  const fragment = target.section ? `#${sectionFragment(target.section)}` : '';
  return target.page ? `${POD_PAGE_URL_PREFIX}${target.page}${fragment}` : fragment;
}

function phrasing(nodes: PodInline[]): PhrasingContent[] {
  const result: PhrasingContent[] = [];
  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        result.push({ type: 'text', value: node.value });
        break;
      case 'bold':
        result.push({ type: 'strong', children: phrasing(node.children) });
        break;
      case 'italic':
      case 'file':
        result.push({ type: 'emphasis', children: phrasing(node.children) });
        break;
      case 'code':
        result.push({ type: 'inlineCode', value: inlineToPlainText(node.children) });
        break;
      case 'nbsp':
        result.push({ type: 'text', value: inlineToPlainText(node.children).replace(/ /g, '\u00A0') });
        break;
      case 'link':
        result.push({ type: 'link', url: linkUrl(node.target), children: phrasing(node.children) });
        break;
    }
  }
  return result;
}

/**
 * Strip the indentation shared by every non-blank line of a verbatim block.
 */
export function dedent(text: string): string {
  const lines = text.split('\n');
  const widths = lines
    .filter(line => line.trim() !== '')
    .map(line => /^[ \t]*/.exec(line)?.[0].length ?? 0);
  const shared = widths.length > 0 ? Math.min(...widths) : 0;
  return lines.map(line => line.slice(Math.min(shared, line.length))).join('\n');
}

class MdastBuilder {
  constructor(private readonly options: PodToMdastOptions) {}

  blocks(blocks: PodBlock[]): BlockContent[] {
    return blocks.flatMap(block => this.block(block));
  }

  private block(block: PodBlock): BlockContent[] {
    switch (block.type) {
      case 'heading': {
        const heading: Heading = { type: 'heading', depth: block.level, children: phrasing(block.content) };
        return [heading];
      }
      case 'paragraph':
        return [{ type: 'paragraph', children: phrasing(block.content) }];
      case 'verbatim':
        return [{ type: 'code', value: dedent(block.text) }];
      case 'indent':
        return [{ type: 'blockquote', children: this.blocks(block.children) }];
      case 'list':
        return [this.list(block.kind === 'number', block.items.map(item => this.item(item.label, item.children)))];
      case 'data':
        return this.options.rawFormats.includes(block.format) ? [{ type: 'html', value: block.text }] : [];
    }
  }

  private item(label: PodInline[], children: PodBlock[]): ListItem {
    const content: BlockContent[] = [];
    if (label.length > 0) {
      content.push({ type: 'paragraph', children: phrasing(label) });
    }
    content.push(...this.blocks(children));
    return { type: 'listItem', spread: children.length > 0, children: content };
  }

  private list(ordered: boolean, items: ListItem[]): List {
    return { type: 'list', ordered, start: ordered ? 1 : undefined, spread: false, children: items };
  }
}

export function podToMdast(pod: string, options: PodToMdastOptions): Root {
  const children: RootContent[] = new MdastBuilder(options).blocks(parsePod(pod).blocks);
  return { type: 'root', children };
}

/**
 * Text of the first paragraph under `=head1 NAME`, used as a document title.
 */
export function podTitle(pod: string): string | undefined {
  const blocks = parsePod(pod).blocks;
  const index = blocks.findIndex(
    block => block.type === 'heading' && block.level === 1 && inlineToPlainText(block.content).trim() === 'NAME'
  );
  const next = index >= 0 ? blocks[index + 1] : undefined;
  return next && next.type === 'paragraph' ? inlineToPlainText(next.content).trim() : undefined;
}
