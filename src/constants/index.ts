/**
 * Shared constants for the readme-from-pod build host and plugin.
 */

export const FILE_PATTERNS = {
  DIST_YML: 'dist.yml',
  MODULE_EXTENSION: '.pm',
  POD_EXTENSION: '.pod',
  ARCHIVE_EXTENSION: '.tar.gz',
} as const;

export const README_LOCATIONS = ['build', 'root'] as const;
export const README_PHASES = ['build', 'release'] as const;
export const BUILD_HOOKS = ['munge', 'installer'] as const;

export const README_DEFAULTS = {
  TYPE: 'text',
  LOCATION: 'build',
  PHASE: 'build',
  BUILD_HOOK: 'munge',
} as const;

/** Content of a README registered during gathering, before it is generated. */
export const PLACEHOLDER_CONTENT = 'this will be overwritten';

/** Prefix for links to POD pages that are not in this distribution. */
export const POD_PAGE_URL_PREFIX = 'https://metacpan.org/pod/';

/** Text wrap width for plain text output. */
export const TEXT_COLUMNS = 76;

export const README_PLUGIN_MONIKER = 'ReadmeAnyFromPod';

export const ENV_VARS = {
  LOG_LEVEL: 'PODREADME_LOG_LEVEL',
} as const;
