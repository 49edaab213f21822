import assert from 'node:assert/strict';

import { lookupFormat } from '../src/core/readme/formats.js';
import { extractPod, findPodRegions } from '../src/core/pod/pod-extract.js';

const MODULE = [
  'package Foo;',
  '',
  '=head1 NAME',
  '',
  'Foo',
  '',
  '=cut',
  '',
  'sub hello { 1 }',
  ''
].join('\n');

async function runRegionTests(): Promise<void> {
  assert.deepEqual(findPodRegions(MODULE), [['=head1 NAME', '', 'Foo', '', '=cut']]);
  assert.deepEqual(findPodRegions('package Foo;\n1;\n'), []);
  assert.deepEqual(findPodRegions('code;\n__DATA__\n=head1 NOPE\n'), [], '__DATA__ ends the scan');
  assert.deepEqual(findPodRegions('=cut\n'), [['=cut']]);
}

async function runMergeTests(): Promise<void> {
  assert.equal(extractPod(MODULE), '=pod\n\n=head1 NAME\n\nFoo\n\n=cut\n');

  const split = [
    '=head1 A',
    '',
    'One',
    '',
    '=cut',
    '',
    'code;',
    '',
    '=pod',
    '',
    '=head1 B',
    '',
    'Two',
    '',
    '=cut',
    ''
  ].join('\n');
  assert.equal(extractPod(split), '=pod\n\n=head1 A\n\nOne\n\n=head1 B\n\nTwo\n\n=cut\n');

  assert.equal(extractPod('package Foo;\n1;\n'), '', 'no POD yields empty markup');
  assert.equal(extractPod('code;\n=head1 X\n\nY\n'), '=pod\n\n=head1 X\n\nY\n\n=cut\n', 'unterminated region runs to the end');
  assert.equal(extractPod('code;\n__END__\n=head1 DOC\n\nText\n'), '=pod\n\n=head1 DOC\n\nText\n\n=cut\n');
  assert.equal(extractPod('=pod\n\n=cut\n'), '=pod\n\n=cut\n', 'empty regions leave only the wrapper');
  assert.equal(extractPod('a;\r\n=head1 CRLF\r\n\r\nBody\r\n=cut\r\n'), '=pod\n\n=head1 CRLF\n\nBody\n\n=cut\n');
}

async function runHeredocTests(): Promise<void> {
  const quoted = [
    "my $template = <<'EOT';",
    '=head1 NOT POD',
    'EOT',
    '',
    'sub render { 1 }',
    '',
    '=head1 NAME',
    '',
    'Foo',
    '',
    '=cut',
    ''
  ].join('\n');
  assert.equal(extractPod(quoted), '=pod\n\n=head1 NAME\n\nFoo\n\n=cut\n', 'heredoc bodies are code, not POD');

  const several = [
    'print <<"FIRST", <<SECOND;',
    '=head1 ONE',
    'FIRST',
    '=head1 TWO',
    'SECOND',
    'my $doc = <<~END;',
    '    =head1 THREE',
    '    END',
    '=head1 REAL',
    '',
    'Text',
    '=cut',
    ''
  ].join('\n');
  assert.deepEqual(findPodRegions(several), [['=head1 REAL', '', 'Text', '=cut']]);

  assert.equal(
    extractPod('my $x = 1 << 2;\n=head1 X\n\nY\n=cut\n'),
    '=pod\n\n=head1 X\n\nY\n\n=cut\n',
    'a shift operator opens no heredoc'
  );
}

async function runPodFormatTests(): Promise<void> {
  const pod = lookupFormat('pod');
  const markup = extractPod(MODULE);

  assert.equal(pod.convert(markup), markup, 'the pod format passes markup through');
  assert.equal(extractPod(markup), markup, 'extracting merged markup again changes nothing');
}

await runRegionTests();
await runMergeTests();
await runHeredocTests();
await runPodFormatTests();

console.log('pod-extract tests passed');
