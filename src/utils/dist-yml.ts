import * as yaml from 'js-yaml';
import * as semver from 'semver';
import type { DistYml, PluginEntry } from '../types/index.js';
import { DistConfigError } from './errors.js';
import { readTextFile } from './fs.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(parsed: Record<string, unknown>, key: string): string | undefined {
  const value = parsed[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new DistConfigError(`dist.yml field '${key}' must be a non-empty string`, { field: key });
  }
  return value.trim();
}

/**
 * `Moniker` or `Moniker / name`; the name defaults to the moniker.
 */
export function parsePluginSpec(spec: string): { moniker: string; name: string } {
  const slash = spec.indexOf('/');
  const moniker = (slash >= 0 ? spec.slice(0, slash) : spec).trim();
  const name = slash >= 0 ? spec.slice(slash + 1).trim() : moniker;
  if (!moniker || !name) {
    throw new DistConfigError(`Invalid plugin entry '${spec}'`, { entry: spec });
  }
  return { moniker, name };
}

function parsePluginEntry(entry: unknown, index: number): PluginEntry {
  if (typeof entry === 'string') {
    return { ...parsePluginSpec(entry), options: {} };
  }
  if (isRecord(entry)) {
    const { plugin, ...options } = entry;
    if (typeof plugin === 'string') {
      return { ...parsePluginSpec(plugin), options };
    }
  }
  throw new DistConfigError(
    `dist.yml plugins[${index}] must be a string or an object with a 'plugin' key`,
    { index }
  );
}

function parseEncodings(value: unknown): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new DistConfigError(`dist.yml field 'encodings' must map file paths to encoding names`);
  }
  const encodings: Record<string, string> = {};
  for (const [path, encoding] of Object.entries(value)) {
    if (typeof encoding !== 'string') {
      throw new DistConfigError(`Encoding for '${path}' must be a string`, { path });
    }
    encodings[path] = encoding;
  }
  return encodings;
}

/**
 * Validate parsed dist.yml content.
 */
export function parseDistYmlContent(content: string): DistYml {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new DistConfigError(`Failed to parse dist.yml: ${error}`);
  }
  if (!isRecord(parsed)) {
    throw new DistConfigError('dist.yml must contain a mapping');
  }

  const name = optionalString(parsed, 'name');
  if (!name) {
    throw new DistConfigError('dist.yml must contain a name field');
  }

  const rawVersion = typeof parsed.version === 'number' ? String(parsed.version) : parsed.version;
  if (typeof rawVersion !== 'string' || !semver.valid(rawVersion)) {
    throw new DistConfigError(`dist.yml version '${String(rawVersion)}' is not a valid semver version`, {
      version: rawVersion
    });
  }

  const rawPlugins = parsed.plugins ?? [];
  if (!Array.isArray(rawPlugins)) {
    throw new DistConfigError(`dist.yml field 'plugins' must be a list`);
  }

  return {
    name,
    version: semver.clean(rawVersion) ?? rawVersion,
    main_module: optionalString(parsed, 'main_module'),
    build_dir: optionalString(parsed, 'build_dir'),
    encodings: parseEncodings(parsed.encodings),
    plugins: rawPlugins.map((entry: unknown, index) => parsePluginEntry(entry, index))
  };
}

export async function parseDistYml(distYmlPath: string): Promise<DistYml> {
  let content: string;
  try {
    content = await readTextFile(distYmlPath);
  } catch (error) {
    throw new DistConfigError(`Could not read ${distYmlPath}: ${error}`, { path: distYmlPath });
  }
  return parseDistYmlContent(content);
}
