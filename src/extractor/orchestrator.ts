import { join } from 'path';
import type { PathConfig } from '../config/paths.js';
import type { ProjectMetadata } from '../config/project.js';
import { ExtractorExitError, ExtractorLaunchError, ExtractorOutputError } from '../errors.js';
import { buildDirectives, serializeDirectives, type Directive } from './directives.js';
import { spawnRunner, type ProcessRunner } from './runner.js';
import { fileExists } from '../utils/files.js';

export const DEFAULT_DOXYGEN_COMMAND = 'doxygen';

export interface ExtractionOptions {
  /** Doxygen executable, looked up on PATH unless absolute. */
  command?: string;
  runner?: ProcessRunner;
  /** Fail when no index.xml exists after Doxygen exits. Defaults to true. */
  verifyOutput?: boolean;
  verbose?: boolean;
}

export interface ExtractionResult {
  directives: Directive[];
  /** The exact text written to Doxygen's stdin. */
  input: string;
  durationMs: number;
}

/**
 * Run Doxygen over the library headers, writing XML to
 * `paths.doxygenOutputDir`. Blocks until Doxygen exits and throws if it could
 * not be started, exited non-zero, or left no XML index behind.
 */
export function runExtraction(
  project: Pick<ProjectMetadata, 'name'>,
  paths: PathConfig,
  options: ExtractionOptions = {}
): ExtractionResult {
  const startTime = Date.now();
  const command = options.command ?? DEFAULT_DOXYGEN_COMMAND;
  const runner = options.runner ?? spawnRunner;

  console.log(
    `Running Doxygen. Input dir is '${paths.codeSourceDir}'. Output dir is '${paths.doxygenOutputDir}'.`
  );

  const directives = buildDirectives(project, paths);
  const input = serializeDirectives(directives);

  if (options.verbose) {
    console.log(`Doxygen configuration:\n${input}`);
  }

  // "-" reads the configuration from stdin instead of a Doxyfile
  const result = runner(command, ['-'], { input });

  if (result.error) {
    throw new ExtractorLaunchError(command, result.error);
  }

  if (result.status !== 0) {
    throw new ExtractorExitError(result.status, result.signal);
  }

  if (options.verifyOutput ?? true) {
    const indexFile = join(paths.doxygenOutputDir, 'index.xml');
    if (!fileExists(indexFile)) {
      throw new ExtractorOutputError(indexFile);
    }
  }

  const durationMs = Date.now() - startTime;
  if (options.verbose) {
    console.log(`Doxygen finished in ${durationMs}ms`);
  }

  return { directives, input, durationMs };
}
