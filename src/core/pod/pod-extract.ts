/**
 * Locate the POD regions of a source file and merge them into one document.
 *
 * A region opens at a line starting with `=identifier` and closes after the
 * next `=cut` line (or at end of input). `__END__` does not stop the scan,
 * `__DATA__` does. Heredoc bodies in code are skipped.
 */

const POD_START = /^=[a-zA-Z]/;
const POD_CUT = /^=cut\b/;
const POD_OPEN = /^=pod\b/;
const END_MARKER = /^__END__\s*$/;
const DATA_MARKER = /^__DATA__\s*$/;
const HEREDOC_OPENER = /<<(~?)(?:\s*"([^"\n]*)"|\s*'([^'\n]*)'|([A-Za-z_]\w*))/g;

interface Heredoc {
  terminator: string;
  indented: boolean;
}

/**
 * Heredocs opened on a code line, in the order their bodies follow it.
 */
function heredocsOpenedBy(line: string): Heredoc[] {
  const heredocs: Heredoc[] = [];
  for (const match of line.matchAll(HEREDOC_OPENER)) {
    const [, tilde, doubleQuoted, singleQuoted, bare] = match;
    heredocs.push({ terminator: doubleQuoted ?? singleQuoted ?? bare ?? '', indented: tilde === '~' });
  }
  return heredocs;
}

function endsHeredoc(line: string, heredoc: Heredoc): boolean {
  return (heredoc.indented ? line.trimStart() : line) === heredoc.terminator;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Raw POD regions in source order, one array of lines per region.
 */
export function findPodRegions(source: string): string[][] {
  const regions: string[][] = [];
  let current: string[] | null = null;
  let pending: Heredoc[] = [];
  let afterEnd = false;

  for (const line of splitLines(source)) {
    if (current) {
      current.push(line);
      if (POD_CUT.test(line)) {
        regions.push(current);
        current = null;
      }
      continue;
    }

    const heredoc = pending[0];
    if (heredoc) {
      if (endsHeredoc(line, heredoc)) {
        pending = pending.slice(1);
      }
      continue;
    }

    if (DATA_MARKER.test(line)) {
      break;
    }
    if (END_MARKER.test(line)) {
      afterEnd = true;
      continue;
    }
    if (POD_START.test(line)) {
      if (POD_CUT.test(line)) {
        regions.push([line]);
      } else {
        current = [line];
      }
    } else if (!afterEnd) {
      pending = heredocsOpenedBy(line);
    }
  }

  if (current) {
    regions.push(current);
  }
  return regions;
}

function trimRegion(lines: string[]): string[] {
  const trimmed = [...lines];
  if (trimmed.length > 0 && POD_OPEN.test(trimmed[0])) {
    trimmed.shift();
  }
  if (trimmed.length > 0 && POD_CUT.test(trimmed[trimmed.length - 1])) {
    trimmed.pop();
  }
  while (trimmed.length > 0 && trimmed[0] === '') {
    trimmed.shift();
  }
  while (trimmed.length > 0 && trimmed[trimmed.length - 1] === '') {
    trimmed.pop();
  }
  return trimmed;
}

/**
 * Merge regions into a single `=pod` ... `=cut` document. Empty regions are dropped.
 */
export function mergePodRegions(regions: string[][]): string {
  const sections = regions.map(trimRegion).filter(lines => lines.length > 0);
  return [['=pod'], ...sections, ['=cut']]
    .map(lines => `${lines.join('\n')}\n`)
    .join('\n');
}

/**
 * All POD of `source`, merged; `''` when the source carries none.
 */
export function extractPod(source: string): string {
  const regions = findPodRegions(source);
  if (regions.length === 0) {
    return '';
  }
  return mergePodRegions(regions);
}
