import { parseInline, type PodInline } from './pod-inline.js';

export type PodListKind = 'bullet' | 'number' | 'definition';

export interface PodListItem {
  label: PodInline[];
  children: PodBlock[];
}

export type PodBlock =
  | { type: 'heading'; level: 1 | 2 | 3 | 4; content: PodInline[] }
  | { type: 'paragraph'; content: PodInline[] }
  | { type: 'verbatim'; text: string }
  | { type: 'list'; kind: PodListKind; items: PodListItem[] }
  | { type: 'indent'; children: PodBlock[] }
  | { type: 'data'; format: string; text: string };

export interface PodDocument {
  encoding?: string;
  blocks: PodBlock[];
}

interface OverFrame {
  kind?: PodListKind;
  leading: PodBlock[];
  items: PodListItem[];
}

interface DataRegion {
  format: string;
  paragraphs: string[];
}

const COMMAND = /^=([a-zA-Z][a-zA-Z0-9]*)(?:[ \t]+|$)/;

function splitParagraphs(pod: string): string[][] {
  const paragraphs: string[][] = [];
  let current: string[] = [];
  for (const line of pod.split(/\r\n|\r|\n/)) {
    if (/^\s*$/.test(line)) {
      if (current.length > 0) {
        paragraphs.push(current);
        current = [];
      }
    } else {
      current.push(line);
    }
  }
  if (current.length > 0) {
    paragraphs.push(current);
  }
  return paragraphs;
}

function collapse(text: string): string {
  return text.replace(/[ \t\r\n]+/g, ' ').trim();
}

function classifyItem(text: string): { kind: PodListKind; label: string } {
  if (text === '' || text === '*') {
    return { kind: 'bullet', label: '' };
  }
  const bullet = /^\*\s+(.*)$/.exec(text);
  if (bullet) {
    return { kind: 'bullet', label: bullet[1] };
  }
  const numbered = /^\d+\.?(?:\s+(.*))?$/.exec(text);
  if (numbered) {
    return { kind: 'number', label: numbered[1] ?? '' };
  }
  return { kind: 'definition', label: text };
}

/**
 * Parse a POD document into blocks. Unknown commands are ignored; `=over`
 * regions left open at the end are closed implicitly.
 */
export function parsePod(pod: string): PodDocument {
  const doc: PodDocument = { blocks: [] };
  const frames: OverFrame[] = [];
  let data: DataRegion | null = null;
  let lastWasVerbatim = false;

  const target = (): PodBlock[] => {
    const frame = frames[frames.length - 1];
    if (!frame) {
      return doc.blocks;
    }
    const item = frame.items[frame.items.length - 1];
    return item ? item.children : frame.leading;
  };

  const closeFrame = (): void => {
    const frame = frames.pop();
    if (!frame) {
      return;
    }
    const parent = target();
    if (frame.items.length === 0) {
      parent.push({ type: 'indent', children: frame.leading });
      return;
    }
    parent.push(...frame.leading);
    parent.push({ type: 'list', kind: frame.kind ?? 'bullet', items: frame.items });
  };

  for (const lines of splitParagraphs(pod)) {
    const command = COMMAND.exec(lines[0]);
    const paragraphIsVerbatim = !command && /^[ \t]/.test(lines[0]);

    if (data) {
      if (command && command[1] === 'end') {
        target().push({ type: 'data', format: data.format, text: data.paragraphs.join('\n\n') });
        data = null;
      } else {
        data.paragraphs.push(lines.join('\n'));
      }
      lastWasVerbatim = false;
      continue;
    }

    if (paragraphIsVerbatim) {
      const blocks = target();
      const previous = blocks[blocks.length - 1];
      const text = lines.join('\n');
      if (lastWasVerbatim && previous && previous.type === 'verbatim') {
        previous.text += `\n\n${text}`;
      } else {
        blocks.push({ type: 'verbatim', text });
      }
      lastWasVerbatim = true;
      continue;
    }
    lastWasVerbatim = false;

    if (!command) {
      target().push({ type: 'paragraph', content: parseInline(collapse(lines.join(' '))) });
      continue;
    }

    const name = command[1];
    const rest = [lines[0].slice(command[0].length), ...lines.slice(1)].join('\n');

    switch (name) {
      case 'head1':
      case 'head2':
      case 'head3':
      case 'head4': {
        while (frames.length > 0) {
          closeFrame();
        }
        const level = Number(name.slice(4));
        if (level === 1 || level === 2 || level === 3 || level === 4) {
          doc.blocks.push({ type: 'heading', level, content: parseInline(collapse(rest)) });
        }
        break;
      }
      case 'over':
        frames.push({ leading: [], items: [] });
        break;
      case 'item': {
        const frame = frames[frames.length - 1];
        const { kind, label } = classifyItem(collapse(rest));
        if (!frame) {
          // stray =item: keep its text as a paragraph
          if (label) {
            doc.blocks.push({ type: 'paragraph', content: parseInline(label) });
          }
          break;
        }
        frame.kind ??= kind;
        frame.items.push({ label: parseInline(label), children: [] });
        break;
      }
      case 'back':
        closeFrame();
        break;
      case 'begin': {
        const format = collapse(rest).split(' ')[0] ?? '';
        if (!format.startsWith(':')) {
          data = { format: format.toLowerCase(), paragraphs: [] };
        }
        break;
      }
      case 'for': {
        const match = /^\s*(\S+)\s*([\s\S]*)$/.exec(rest);
        if (match && !match[1].startsWith(':')) {
          target().push({ type: 'data', format: match[1].toLowerCase(), text: match[2].trimEnd() });
        } else if (match && match[2].trim() !== '') {
          target().push({ type: 'paragraph', content: parseInline(collapse(match[2])) });
        }
        break;
      }
      case 'encoding':
        doc.encoding = collapse(rest) || undefined;
        break;
      default:
        // =pod, =cut, =end outside a region and unknown commands carry no content
        break;
    }
  }

  if (data) {
    target().push({ type: 'data', format: data.format, text: data.paragraphs.join('\n\n') });
  }
  while (frames.length > 0) {
    closeFrame();
  }
  return doc;
}
