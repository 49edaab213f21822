import assert from 'node:assert/strict';

import { BuildFile, BuildFileSet } from '../src/core/build/file-set.js';
import { WatchRegistry } from '../src/core/build/watch-registry.js';

async function runFileSetTests(): Promise<void> {
  const files = new BuildFileSet();
  const readme = new BuildFile('README', 'placeholder');
  const module = new BuildFile('lib/Foo.pm', 'package Foo;\n', 'latin1', 'gather');

  files.insert(readme);
  files.insert(module);

  assert.equal(files.size, 2);
  assert.equal(files.find('README'), readme);
  assert.equal(files.find('missing'), undefined);
  assert.deepEqual(
    files.list().map(file => file.name),
    ['README', 'lib/Foo.pm'],
    'insertion order is kept'
  );
  assert.equal(readme.encoding, 'UTF-8');
  assert.equal(readme.addedBy, 'unknown');
  assert.equal(module.addedBy, 'gather');

  assert.equal(files.remove(readme), true);
  assert.equal(files.remove(readme), false, 'removing twice is a no-op');
  assert.equal(files.size, 1);
}

async function runChangeListenerTests(): Promise<void> {
  const file = new BuildFile('lib/Foo.pm', 'one');
  const seen: string[] = [];
  file.onChange(changed => seen.push(changed.content));

  file.setContent('one');
  assert.deepEqual(seen, [], 'unchanged content does not notify');

  file.setContent('two');
  file.setContent('two');
  file.setContent('three');
  assert.deepEqual(seen, ['two', 'three']);
  assert.equal(file.listenerCount, 1);
}

async function runByteContentTests(): Promise<void> {
  const png = Buffer.from('89504e470d0a1a0afffe0080', 'hex');
  const image = new BuildFile('share/logo.png', png, 'raw');
  assert.equal(image.toBytes(), png, 'untouched files keep their original bytes');
  assert.equal(image.content.length, 12);
  assert.equal(image.toBytes(), png, 'reading the content does not re-encode');

  const latin1 = new BuildFile('lib/Foo.pm', Buffer.from('caf\u00E9', 'latin1'), 'latin1');
  assert.equal(latin1.content, 'caf\u00E9');

  const module = new BuildFile('lib/Bar.pm', Buffer.from('caf\u00E9', 'utf8'));
  module.setContent('caf\u00E9');
  assert.deepEqual(module.toBytes(), Buffer.from('caf\u00E9', 'utf8'), 'identical text is not a change');
  module.setContent('th\u00E9');
  assert.deepEqual(module.toBytes(), Buffer.from('th\u00E9', 'utf8'));

  assert.deepEqual(new BuildFile('README', 'text').toBytes(), Buffer.from('text', 'utf8'));
}

async function runWatchRegistryTests(): Promise<void> {
  const registry = new WatchRegistry();
  const source = new BuildFile('lib/Foo.pm', 'v1');
  const calls: string[] = [];

  assert.equal(registry.isWatching('lib/Foo.pm'), false);
  registry.subscribe(source, changed => calls.push(`first:${changed.content}`));
  registry.subscribe(source, changed => calls.push(`second:${changed.content}`));

  assert.equal(source.listenerCount, 1, 'one listener per source file');
  assert.equal(registry.isWatching('lib/Foo.pm'), true);
  assert.equal(registry.subscriberCount('lib/Foo.pm'), 2);
  assert.equal(registry.subscriberCount('lib/Other.pm'), 0);

  source.setContent('v2');
  assert.deepEqual(calls, ['first:v2', 'second:v2'], 'every subscriber hears each change once');
}

await runFileSetTests();
await runChangeListenerTests();
await runByteContentTests();
await runWatchRegistryTests();

console.log('file-set tests passed');
