import type { FormatId, ReadmeLocation } from '../../types/index.js';
import { README_LOCATIONS } from '../../constants/index.js';
import { allFormatIds, isFormatId } from './formats.js';

export interface NameInference {
  type?: FormatId;
  location?: ReadmeLocation;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isLocation(value: string): value is ReadmeLocation {
  return README_LOCATIONS.some(location => location === value);
}

/**
 * `["Readme"] <type> [["In"] <location>]`, case-insensitive, matched against
 * the whole segment after the last `/` with surrounding whitespace ignored.
 */
function buildNamePattern(): RegExp {
  const types = allFormatIds().map(escapeRegExp).join('|');
  const locations = README_LOCATIONS.map(escapeRegExp).join('|');
  return new RegExp(`(?:^|/)\\s*(?:readme)?(${types})(?:(?:in)?(${locations}))?\\s*$`, 'i');
}

/**
 * Per-run memo of name inferences. Build one per run so nothing leaks between runs.
 */
export class NameResolutionCache {
  private readonly entries = new Map<string, NameInference>();
  private readonly pattern = buildNamePattern();

  resolve(name: string): NameInference {
    const cached = this.entries.get(name);
    if (cached) {
      return cached;
    }

    const inference: NameInference = {};
    const match = this.pattern.exec(name.toLowerCase());
    if (match) {
      const [, type, location] = match;
      if (isFormatId(type)) {
        inference.type = type;
      }
      if (location !== undefined && isLocation(location)) {
        inference.location = location;
      }
    }

    const frozen = Object.freeze(inference);
    this.entries.set(name, frozen);
    return frozen;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Infer README type and location from a plugin instance name such as
 * `ReadmeAnyFromPod / ReadmeMarkdownInRoot`. Names that do not fit the
 * grammar infer nothing.
 */
export function resolveFromName(name: string, cache: NameResolutionCache): NameInference {
  return cache.resolve(name);
}
