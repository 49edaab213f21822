import assert from 'node:assert/strict';

import { podToHtml } from '../src/core/pod/pod-html.js';
import { podToGfm, podToMarkdown } from '../src/core/pod/pod-markdown.js';
import { podTitle } from '../src/core/pod/pod-mdast.js';
import { parsePod } from '../src/core/pod/pod-parser.js';
import { podToText, wrapText } from '../src/core/pod/pod-text.js';

const NAME_POD = '=pod\n\n=head1 NAME\n\nFoo\n\n=cut\n';
const LIST_POD = '=over 4\n\n=item * one\n\n=item * two\n\n=back\n';
const SYNOPSIS_POD = '=head1 SYNOPSIS\n\n  use Foo;\n  Foo->new;\n';

async function runParserTests(): Promise<void> {
  const doc = parsePod('=encoding utf8\n\n=head2 Sub\n\nBody B<bold>\n');
  assert.equal(doc.encoding, 'utf8');
  assert.deepEqual(doc.blocks, [
    { type: 'heading', level: 2, content: [{ type: 'text', value: 'Sub' }] },
    {
      type: 'paragraph',
      content: [
        { type: 'text', value: 'Body ' },
        { type: 'bold', children: [{ type: 'text', value: 'bold' }] }
      ]
    }
  ]);

  const list = parsePod(LIST_POD).blocks;
  assert.equal(list.length, 1);
  assert.equal(list[0].type, 'list');
}

async function runTextTests(): Promise<void> {
  assert.equal(wrapText('aaa bbb ccc', '  ', 10), '  aaa bbb\n  ccc\n');
  assert.equal(wrapText('', '    '), '\n');

  assert.equal(podToText(NAME_POD), 'NAME\n\n    Foo\n\n');
  assert.equal(podToText('=head2 Sub\n\nBody\n'), ' Sub\n\n    Body\n\n');
  assert.equal(podToText(LIST_POD), '    * one\n\n    * two\n\n');
  assert.equal(podToText(SYNOPSIS_POD), 'SYNOPSIS\n\n      use Foo;\n      Foo->new;\n\n');
  assert.equal(podToText('Use B<this> and C<that>.\n'), '    Use this and that.\n\n');
  assert.equal(podToText('See L<the site|https://example.com/>.\n'), '    See the site <https://example.com/>.\n\n');
  assert.equal(podToText('a E<lt> b\n'), '    a < b\n\n');
  assert.equal(podToText('=begin html\n\n<p>raw</p>\n\n=end html\n'), '', 'foreign data blocks are dropped');
  assert.equal(podToText(''), '');
}

async function runMarkdownTests(): Promise<void> {
  assert.equal(podToMarkdown(NAME_POD), '# NAME\n\nFoo\n');
  assert.equal(
    podToMarkdown('=head1 USAGE\n\nUse B<this> and C<that> or I<other>.\n'),
    '# USAGE\n\nUse **this** and `that` or *other*.\n'
  );
  assert.equal(podToMarkdown('=head1 SYNOPSIS\n\n    use Foo;\n'), '# SYNOPSIS\n\n    use Foo;\n');
  assert.equal(podToMarkdown(LIST_POD), '- one\n- two\n');
  assert.equal(podToMarkdown('=over\n\n=item 1. first\n\n=item 2. second\n\n=back\n'), '1. first\n2. second\n');
  assert.equal(
    podToMarkdown('See L<Foo::Bar>.\n'),
    'See [Foo::Bar](https://metacpan.org/pod/Foo::Bar).\n'
  );
  assert.equal(podToMarkdown('=begin html\n\n<p>raw</p>\n\n=end html\n'), '<p>raw</p>\n');
  assert.equal(podToMarkdown(''), '');
}

async function runGfmTests(): Promise<void> {
  assert.equal(podToGfm(NAME_POD), '# NAME\n\nFoo\n');
  assert.equal(podToGfm('=head1 SYNOPSIS\n\n    use Foo;\n'), '# SYNOPSIS\n\n```\nuse Foo;\n```\n');
  assert.equal(podToGfm(LIST_POD), '- one\n- two\n');
}

async function runHtmlTests(): Promise<void> {
  assert.equal(podTitle(NAME_POD), 'Foo');
  assert.equal(podTitle('=head1 DESCRIPTION\n\nNothing\n'), undefined);

  assert.equal(
    podToHtml(NAME_POD),
    [
      '<!doctype html>',
      '<html>',
      '<head>',
      '<meta charset="utf-8">',
      '<title>Foo</title>',
      '</head>',
      '<body>',
      '<h1>NAME</h1>',
      '<p>Foo</p>',
      '</body>',
      '</html>',
      ''
    ].join('\n')
  );

  const html = podToHtml('=head1 NAME\n\nA E<lt> B\n');
  assert.ok(html.includes('<title>A &#x3C; B</title>'), 'the title is escaped');
}

await runParserTests();
await runTextTests();
await runMarkdownTests();
await runGfmTests();
await runHtmlTests();

console.log('pod-formats tests passed');
