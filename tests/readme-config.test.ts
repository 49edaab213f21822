import assert from 'node:assert/strict';
import { join } from 'node:path';

import { lookupFormat } from '../src/core/readme/formats.js';
import { NameResolutionCache } from '../src/core/readme/name-resolution.js';
import { parseReadmeOptions, ReadmeConfig, type ReadmeConfigEnvironment } from '../src/core/readme/readme-config.js';
import type { ReadmeOptions } from '../src/types/index.js';
import { InvalidConfigurationError, UnknownFormatError } from '../src/utils/errors.js';
import { RecordingLogger } from './test-helpers.js';

const ROOT = '/project';

function environment(existing: string[] = []): ReadmeConfigEnvironment {
  return {
    nameCache: new NameResolutionCache(),
    rootDir: ROOT,
    mainModuleName: () => 'lib/Foo/Bar.pm',
    fileExists: path => existing.includes(path)
  };
}

function config(name: string, options: ReadmeOptions = {}, existing: string[] = []): ReadmeConfig {
  return new ReadmeConfig(name, options, environment(existing));
}

async function runDefaultTests(): Promise<void> {
  const defaults = config('ReadmeAnyFromPod');
  assert.deepEqual(defaults.toJSON(), {
    type: 'text',
    filename: 'README',
    sourceFilename: 'lib/Foo/Bar.pm',
    location: 'build',
    phase: 'build',
    buildHook: 'munge'
  });

  for (const type of ['pod', 'text', 'markdown', 'gfm', 'html']) {
    const typed = config('ReadmeAnyFromPod', { type, location: 'root' });
    assert.equal(typed.filename, lookupFormat(type).outputFilename, `default filename for ${type}`);
  }

  const withPod = config('ReadmeAnyFromPod', {}, [join(ROOT, 'lib/Foo/Bar.pod')]);
  assert.equal(withPod.sourceFilename, 'lib/Foo/Bar.pod', 'a .pod sibling is preferred');
}

async function runPrecedenceTests(): Promise<void> {
  const inferred = config('ReadmeAnyFromPod / ReadmeMarkdownInRoot');
  assert.equal(inferred.type, 'markdown');
  assert.equal(inferred.location, 'root');
  assert.equal(inferred.filename, 'README.mkdn');

  const overridden = config('ReadmeMarkdownInRoot', { type: 'html' });
  assert.equal(overridden.type, 'html', 'explicit type beats the name');
  assert.equal(overridden.location, 'root', 'location still comes from the name');
  assert.equal(overridden.filename, 'README.html');

  const explicit = config('ReadmeAnyFromPod', {
    filename: 'docs/README.txt',
    source_filename: 'lib/Other.pod',
    location: 'root',
    phase: 'release'
  });
  assert.equal(explicit.filename, 'docs/README.txt');
  assert.equal(explicit.sourceFilename, 'lib/Other.pod');
  assert.equal(explicit.phase, 'release');
}

async function runImmutabilityTests(): Promise<void> {
  const options: ReadmeOptions = { type: 'gfm' };
  const readme = config('ReadmeAnyFromPod', options);
  options.type = 'html';
  assert.equal(readme.type, 'gfm', 'later edits to the options object are not seen');

  const env = environment();
  let mainModule = 'lib/First.pm';
  const lazy = new ReadmeConfig('ReadmeAnyFromPod', {}, { ...env, mainModuleName: () => mainModule });
  assert.equal(lazy.sourceFilename, 'lib/First.pm');
  mainModule = 'lib/Second.pm';
  assert.equal(lazy.sourceFilename, 'lib/First.pm', 'resolved fields are kept');
}

async function runValidationTests(): Promise<void> {
  const logger = new RecordingLogger();

  assert.throws(
    () => config('ReadmeAnyFromPod', { location: 'build', phase: 'release' }).validate(logger),
    (error: unknown) =>
      error instanceof InvalidConfigurationError && error.message === 'You cannot use location=build with phase=release!'
  );
  assert.throws(() => config('ReadmeTextInBuild', { phase: 'release' }).validate(logger), InvalidConfigurationError);
  assert.doesNotThrow(() => config('ReadmeTextInRoot', { phase: 'release' }).validate(logger));

  assert.throws(() => config('ReadmeAnyFromPod', { location: 'moon' }).validate(logger), InvalidConfigurationError);
  assert.throws(() => config('ReadmeAnyFromPod', { phase: 'later' }).validate(logger), InvalidConfigurationError);
  assert.throws(() => config('ReadmeAnyFromPod', { build_hook: 'never' }).validate(logger), InvalidConfigurationError);
  assert.throws(() => config('ReadmeAnyFromPod', { type: 'rtf' }).validate(logger), UnknownFormatError);

  assert.deepEqual(logger.messages('warn'), []);
  config('ReadmePodInBuild').validate(logger);
  assert.deepEqual(logger.messages('warn'), [
    'You are creating a .pod directly in the build - be aware that this will be installed like a .pm file and as a manpage'
  ]);
  config('ReadmePodInRoot').validate(logger);
  assert.equal(logger.messages('warn').length, 1, 'a root .pod is not warned about');
}

async function runOptionParsingTests(): Promise<void> {
  const logger = new RecordingLogger();
  const options = parseReadmeOptions({ type: ' gfm ', filename: 42, location: 'root', colour: 'blue' }, logger);

  assert.deepEqual(options, { type: 'gfm', filename: '42', location: 'root' });
  assert.deepEqual(logger.messages('warn'), ["Ignoring unknown option 'colour'"]);
  assert.throws(() => parseReadmeOptions({ type: ['gfm'] }, logger), InvalidConfigurationError);
}

await runDefaultTests();
await runPrecedenceTests();
await runImmutabilityTests();
await runValidationTests();
await runOptionParsingTests();

console.log('readme-config tests passed');
