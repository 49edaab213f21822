/**
 * POD formatting codes (`B<>`, `I<>`, `C<>`, `L<>`, ...) parsed into inline nodes.
 */

export type PodLinkTarget =
  | { kind: 'url'; url: string }
  | { kind: 'pod'; page?: string; section?: string };

export type PodInline =
  | { type: 'text'; value: string }
  | { type: 'bold'; children: PodInline[] }
  | { type: 'italic'; children: PodInline[] }
  | { type: 'code'; children: PodInline[] }
  | { type: 'file'; children: PodInline[] }
  | { type: 'nbsp'; children: PodInline[] }
  | { type: 'link'; children: PodInline[]; target: PodLinkTarget };

const CODE_LETTERS = new Set(['B', 'I', 'C', 'F', 'S', 'L', 'E', 'X', 'Z']);

const NAMED_ESCAPES: Record<string, string> = {
  lt: '<',
  gt: '>',
  verbar: '|',
  sol: '/',
  quot: '"',
  amp: '&',
  apos: "'",
  nbsp: '\u00A0',
  shy: '\u00AD',
  copy: '©',
  reg: '®',
  laquo: '«',
  raquo: '»',
  eacute: 'é',
  egrave: 'è',
  auml: 'ä',
  ouml: 'ö',
  uuml: 'ü',
  szlig: 'ß',
  mdash: '—',
  ndash: '–',
  hellip: '…'
};

/**
 * Resolve the body of an `E<...>` code. Unknown names are kept literally.
 */
export function decodeEscape(body: string): string {
  const name = body.trim();
  if (/^0x[0-9a-f]+$/i.test(name)) {
    return String.fromCodePoint(parseInt(name.slice(2), 16));
  }
  if (/^0[0-7]+$/.test(name)) {
    return String.fromCodePoint(parseInt(name, 8));
  }
  if (/^\d+$/.test(name)) {
    return String.fromCodePoint(parseInt(name, 10));
  }
  return NAMED_ESCAPES[name] ?? `E<${name}>`;
}

interface OpenCode {
  letter: string;
  /** Number of angle brackets; above one the code closes on whitespace plus that many `>` */
  brackets: number;
  contentStart: number;
}

function openCodeAt(source: string, pos: number): OpenCode | null {
  const letter = source[pos];
  if (!CODE_LETTERS.has(letter) || source[pos + 1] !== '<') {
    return null;
  }
  let brackets = 1;
  while (source[pos + 1 + brackets] === '<') {
    brackets++;
  }
  if (brackets === 1) {
    return { letter, brackets, contentStart: pos + 2 };
  }
  const afterBrackets = pos + 1 + brackets;
  if (!/\s/.test(source[afterBrackets] ?? '')) {
    // `C<<x` is a one-bracket code whose content starts with `<`
    return { letter, brackets: 1, contentStart: pos + 2 };
  }
  let contentStart = afterBrackets;
  while (/\s/.test(source[contentStart] ?? '')) {
    contentStart++;
  }
  return { letter, brackets, contentStart };
}

function closesAt(source: string, pos: number, brackets: number): number | null {
  if (brackets === 1) {
    return source[pos] === '>' ? pos + 1 : null;
  }
  const match = /^\s+(>+)/.exec(source.slice(pos));
  if (match && match[1].length >= brackets) {
    return pos + match[0].length - (match[1].length - brackets);
  }
  return null;
}

interface Parsed {
  nodes: PodInline[];
  raw: string;
  end: number;
}

function pushText(nodes: PodInline[], value: string): void {
  if (value === '') {
    return;
  }
  const last = nodes[nodes.length - 1];
  if (last && last.type === 'text') {
    last.value += value;
  } else {
    nodes.push({ type: 'text', value });
  }
}

function parseSequence(source: string, start: number, brackets: number | null): Parsed {
  const nodes: PodInline[] = [];
  let pos = start;
  let textStart = start;

  while (pos < source.length) {
    if (brackets !== null) {
      const closeEnd = closesAt(source, pos, brackets);
      if (closeEnd !== null) {
        pushText(nodes, source.slice(textStart, pos));
        return { nodes, raw: source.slice(start, pos), end: closeEnd };
      }
    }

    const open = openCodeAt(source, pos);
    if (!open) {
      pos++;
      continue;
    }

    pushText(nodes, source.slice(textStart, pos));
    const inner = parseSequence(source, open.contentStart, open.brackets);
    const node = buildCode(open.letter, inner);
    if (typeof node === 'string') {
      pushText(nodes, node);
    } else if (node) {
      nodes.push(node);
    }
    pos = inner.end;
    textStart = pos;
  }

  // unterminated code: treat the rest as its content
  pushText(nodes, source.slice(textStart));
  return { nodes, raw: source.slice(start), end: source.length };
}

function plainText(nodes: PodInline[]): string {
  return nodes
    .map(node => (node.type === 'text' ? node.value : plainText(node.children)))
    .join('');
}

function buildCode(letter: string, inner: Parsed): PodInline | string | null {
  switch (letter) {
    case 'B':
      return { type: 'bold', children: inner.nodes };
    case 'I':
      return { type: 'italic', children: inner.nodes };
    case 'C':
      return { type: 'code', children: inner.nodes };
    case 'F':
      return { type: 'file', children: inner.nodes };
    case 'S':
      return { type: 'nbsp', children: inner.nodes };
    case 'E':
      return decodeEscape(plainText(inner.nodes));
    case 'L':
      return parseLink(inner.raw);
    default:
      // X<> index entries and Z<> null codes render as nothing
      return null;
  }
}

function unquote(value: string): string {
  const trimmed = value.trim();
  return /^".*"$/.test(trimmed) ? trimmed.slice(1, -1) : trimmed;
}

/**
 * Parse the body of an `L<...>` code: `text|target`, a URL, `page`,
 * `page/section`, `/section` or `"section"`.
 */
export function parseLink(raw: string): PodInline {
  const bar = raw.indexOf('|');
  const explicitText = bar >= 0 ? raw.slice(0, bar) : undefined;
  const targetSource = plainText(parseSequence(bar >= 0 ? raw.slice(bar + 1) : raw, 0, null).nodes).trim();

  let target: PodLinkTarget;
  let defaultText: string;

  if (/^[a-z][-+.a-z0-9]*:[^:\s]\S*$/i.test(targetSource)) {
    target = { kind: 'url', url: targetSource };
    defaultText = targetSource;
  } else {
    const slash = targetSource.indexOf('/');
    let page: string | undefined;
    let section: string | undefined;
    if (slash >= 0) {
      page = targetSource.slice(0, slash).trim() || undefined;
      section = unquote(targetSource.slice(slash + 1)) || undefined;
    } else if (targetSource.startsWith('"')) {
      section = unquote(targetSource);
    } else {
      page = targetSource;
    }
    target = { kind: 'pod', page, section };
    if (page && section) {
      defaultText = `"${section}" in ${page}`;
    } else if (section) {
      defaultText = `"${section}"`;
    } else {
      defaultText = page ?? '';
    }
  }

  const children =
    explicitText !== undefined
      ? parseSequence(explicitText, 0, null).nodes
      : [{ type: 'text' as const, value: defaultText }];
  return { type: 'link', children, target };
}

/**
 * Parse a paragraph's text (whitespace already collapsed) into inline nodes.
 */
export function parseInline(text: string): PodInline[] {
  return parseSequence(text, 0, null).nodes;
}

export function inlineToPlainText(nodes: PodInline[]): string {
  return plainText(nodes);
}
