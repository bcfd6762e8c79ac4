import { resolve } from 'path';

/**
 * Read-only view of the environment. Pass `process.env` in production and a
 * literal object in tests.
 */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export interface PathConfig {
  /** Where Doxygen writes its XML; also the Breathe project directory. */
  doxygenOutputDir: string;
  /** Root of the headers Doxygen scans. */
  codeSourceDir: string;
  /** Sphinx source directory (holds index.rst). */
  docsSourceDir: string;
  /** Where Sphinx writes the HTML site. */
  htmlOutputDir: string;
}

export const PATH_ENV_VARS = {
  doxygenOutputDir: 'DOXYGEN_OUTPUT_DIR',
  codeSourceDir: 'CODE_SOURCE_DIR',
  docsSourceDir: 'DOC_SOURCE_DIR',
  htmlOutputDir: 'HTML_DIR',
} as const satisfies Record<keyof PathConfig, string>;

// Relative to the reference directory (the docs directory).
export const DEFAULT_PATHS = {
  doxygenOutputDir: 'doxygen',
  codeSourceDir: '../include/observable',
  docsSourceDir: '.',
  htmlOutputDir: 'html',
} as const satisfies Record<keyof PathConfig, string>;

function resolveOne(
  env: EnvSnapshot,
  referenceDir: string,
  key: keyof PathConfig
): string {
  const override = env[PATH_ENV_VARS[key]];
  if (override !== undefined && override !== '') {
    return resolve(override);
  }
  return resolve(referenceDir, DEFAULT_PATHS[key]);
}

/**
 * Resolve every build directory. Overrides from `env` win; anything unset
 * falls back to its default under `referenceDir`. Nothing is checked on disk.
 */
export function resolvePaths(env: EnvSnapshot, referenceDir: string): PathConfig {
  const reference = resolve(referenceDir);
  return {
    doxygenOutputDir: resolveOne(env, reference, 'doxygenOutputDir'),
    codeSourceDir: resolveOne(env, reference, 'codeSourceDir'),
    docsSourceDir: resolveOne(env, reference, 'docsSourceDir'),
    htmlOutputDir: resolveOne(env, reference, 'htmlOutputDir'),
  };
}
