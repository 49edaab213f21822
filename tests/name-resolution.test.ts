import assert from 'node:assert/strict';

import { NameResolutionCache, resolveFromName } from '../src/core/readme/name-resolution.js';

async function runInferenceTests(): Promise<void> {
  const cache = new NameResolutionCache();

  assert.deepEqual(resolveFromName('ReadmeMarkdownInRoot', cache), { type: 'markdown', location: 'root' });
  assert.deepEqual(resolveFromName('ReadmeAnyFromPod / HtmlInRoot', cache), { type: 'html', location: 'root' });
  assert.deepEqual(resolveFromName('ReadmeAnyFromPod/ ReadmePodInBuild ', cache), { type: 'pod', location: 'build' });
  assert.deepEqual(resolveFromName('TextRoot', cache), { type: 'text', location: 'root' });
  assert.deepEqual(resolveFromName('readmegfm', cache), { type: 'gfm' }, 'location stays open without a suffix');
  assert.deepEqual(resolveFromName('GFMINBUILD', cache), { type: 'gfm', location: 'build' });
}

async function runNonMatchingTests(): Promise<void> {
  const cache = new NameResolutionCache();

  assert.deepEqual(resolveFromName('ReadmeMarkdownInRootXYZ', cache), {}, 'trailing garbage infers nothing');
  assert.deepEqual(resolveFromName('RootInMarkdown', cache), {});
  assert.deepEqual(resolveFromName('ReadmeAnyFromPod', cache), {});
  assert.deepEqual(resolveFromName('Foo/ReadmeHtml/Extra', cache), {}, 'only the last segment counts');
  assert.deepEqual(resolveFromName('', cache), {});
}

async function runCacheTests(): Promise<void> {
  const cache = new NameResolutionCache();
  const first = cache.resolve('ReadmeHtmlInBuild');
  const second = cache.resolve('ReadmeHtmlInBuild');

  assert.equal(first, second, 'repeated lookups return the memoized inference');
  assert.equal(cache.size, 1);
  assert.equal(Object.isFrozen(first), true);

  cache.resolve('ReadmeTextInRoot');
  assert.equal(cache.size, 2);

  const other = new NameResolutionCache();
  assert.equal(other.size, 0, 'caches do not share entries');
  assert.notEqual(other.resolve('ReadmeHtmlInBuild'), first);
}

await runInferenceTests();
await runNonMatchingTests();
await runCacheTests();

console.log('name-resolution tests passed');
