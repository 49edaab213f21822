import { TEXT_COLUMNS } from '../../constants/index.js';
import type { PodInline } from './pod-inline.js';
import { parsePod, type PodBlock, type PodListKind } from './pod-parser.js';

const NBSP = '\u00A0';

function inlineText(nodes: PodInline[]): string {
  return nodes
    .map(node => {
      switch (node.type) {
        case 'text':
          return node.value;
        case 'nbsp':
          return inlineText(node.children).replace(/ /g, NBSP);
        case 'link': {
          const text = inlineText(node.children);
          if (node.target.kind === 'url' && text !== node.target.url) {
            return `${text} <${node.target.url}>`;
          }
          return text;
        }
        default:
          return inlineText(node.children);
      }
    })
    .join('');
}

/**
 * Greedy word wrap. Lines stay shorter than `columns`; a single word longer
 * than the room left gets a line of its own.
 */
export function wrapText(text: string, indent: string, columns = TEXT_COLUMNS): string {
  const words = text.split(/[ \t\r\n]+/).filter(word => word !== '');
  if (words.length === 0) {
    return '\n';
  }
  const lines: string[] = [];
  let line = indent;

  for (const word of words) {
    if (line === indent) {
      line += word;
    } else if (line.length + 1 + word.length < columns) {
      line += ` ${word}`;
    } else {
      lines.push(line);
      line = indent + word;
    }
  }
  lines.push(line);
  return `${lines.join('\n')}\n`.replace(/\u00AD/g, '').replace(/\u00A0/g, ' ');
}

class TextWriter {
  private out = '';
  private level = 0;

  private indent(tweak: number): string {
    return ' '.repeat(Math.max(0, 2 * this.level + 4 + tweak));
  }

  paragraph(text: string, tweak = 0): void {
    this.out += `${wrapText(text, this.indent(tweak))}\n`;
  }

  verbatim(text: string, tweak = 0): void {
    const indent = this.indent(tweak);
    this.out += `${text.replace(/^/gm, indent)}\n\n`;
  }

  blocks(blocks: PodBlock[]): void {
    for (const block of blocks) {
      this.block(block);
    }
  }

  private block(block: PodBlock): void {
    switch (block.type) {
      case 'heading':
        this.paragraph(inlineText(block.content), block.level - 5);
        break;
      case 'paragraph':
        this.paragraph(inlineText(block.content));
        break;
      case 'verbatim':
        this.verbatim(block.text);
        break;
      case 'indent':
        this.level++;
        this.blocks(block.children);
        this.level--;
        break;
      case 'list':
        this.level++;
        block.items.forEach((item, index) => {
          this.paragraph(itemLabel(block.kind, index, inlineText(item.label)), -2);
          this.blocks(item.children);
        });
        this.level--;
        break;
      case 'data':
        if (block.format === 'text') {
          this.verbatim(block.text);
        }
        break;
    }
  }

  toString(): string {
    return this.out;
  }
}

function itemLabel(kind: PodListKind, index: number, label: string): string {
  switch (kind) {
    case 'bullet':
      return `* ${label}`;
    case 'number':
      return `${index + 1}. ${label}`;
    case 'definition':
      return label;
  }
}

/**
 * Render POD as plain text: head1 flush left, head2..head4 indented by one
 * more column each, body paragraphs four columns in, wrapped at 76 columns.
 */
export function podToText(pod: string): string {
  const writer = new TextWriter();
  writer.blocks(parsePod(pod).blocks);
  return writer.toString();
}
