import { resolvePaths, PROJECT, type EnvSnapshot, type PathConfig, type ProjectMetadata } from './config/index.js';
import type { ExtractionResult, ProcessRunner } from './extractor/index.js';
import { createRenderConfig, RendererHost, setup, runSphinx } from './render/index.js';

export interface BuildOptions {
  /** Directory the default paths are relative to (the docs directory). */
  referenceDir: string;
  env: EnvSnapshot;
  project?: ProjectMetadata;
  extractOnly?: boolean;
  doxygenCommand?: string;
  sphinxCommand?: string;
  verifyOutput?: boolean;
  verbose?: boolean;
  runner?: ProcessRunner;
}

export interface BuildResult {
  paths: PathConfig;
  extraction: ExtractionResult | null;
  /** Null when only the extraction step ran. */
  htmlOutputDir: string | null;
  durationMs: number;
}

/**
 * Resolve paths, initialize the renderer (which runs Doxygen through its
 * `builder-inited` hook), then render the site with Sphinx.
 */
export function buildDocs(options: BuildOptions): BuildResult {
  const startTime = Date.now();
  const project = options.project ?? PROJECT;
  const paths = resolvePaths(options.env, options.referenceDir);
  const config = createRenderConfig(project, paths);

  let extraction: ExtractionResult | null = null;

  const host = new RendererHost();
  setup(host, {
    command: options.doxygenCommand ?? nonEmpty(options.env.DOXYGEN_EXECUTABLE),
    runner: options.runner,
    verifyOutput: options.verifyOutput,
    verbose: options.verbose,
    onExtracted: (result) => {
      extraction = result;
    },
  });

  host.emit('builder-inited', { project, paths, config });

  if (options.extractOnly) {
    return { paths, extraction, htmlOutputDir: null, durationMs: Date.now() - startTime };
  }

  runSphinx(paths, config, {
    command: options.sphinxCommand,
    runner: options.runner,
    env: options.env,
    verbose: options.verbose,
  });

  return { paths, extraction, htmlOutputDir: paths.htmlOutputDir, durationMs: Date.now() - startTime };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}
