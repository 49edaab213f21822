import { toHast } from 'mdast-util-to-hast';
import { toHtml } from 'hast-util-to-html';
import { podTitle, podToMdast } from './pod-mdast.js';

const HTML_RAW_FORMATS = ['html'] as const;

/**
 * Render POD as a standalone HTML document. The title is taken from the
 * `NAME` section when there is one.
 */
export function podToHtml(pod: string): string {
  const tree = podToMdast(pod, { rawFormats: HTML_RAW_FORMATS });
  const body = toHtml(toHast(tree, { allowDangerousHtml: true }), { allowDangerousHtml: true });
  const title = toHtml({ type: 'text', value: podTitle(pod) ?? '' });

  return [
    '<!doctype html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
    ''
  ].join('\n');
}
