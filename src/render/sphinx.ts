import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { PATH_ENV_VARS, type EnvSnapshot, type PathConfig } from '../config/paths.js';
import { RendererExitError, RendererLaunchError } from '../errors.js';
import { spawnRunner, type ProcessRunner } from '../extractor/runner.js';
import { renderConfPy, type RenderConfig } from './config.js';

export const DEFAULT_SPHINX_COMMAND = 'sphinx-build';

export interface SphinxOptions {
  command?: string;
  runner?: ProcessRunner;
  /** Base environment for the child. Defaults to process.env. */
  env?: EnvSnapshot;
  builder?: string;
  /** Where the generated conf.py is written. Defaults to {@link defaultConfDir}. */
  confDir?: string;
  verbose?: boolean;
}

/**
 * Hidden directory beside the HTML output; the watcher ignores dot entries.
 */
export function defaultConfDir(paths: Pick<PathConfig, 'htmlOutputDir'>): string {
  return join(dirname(paths.htmlOutputDir), '.docbridge');
}

export function writeConfPy(confDir: string, config: Readonly<RenderConfig>): string {
  mkdirSync(confDir, { recursive: true });
  const confPath = join(confDir, 'conf.py');
  writeFileSync(confPath, renderConfPy(config), 'utf-8');
  return confPath;
}

/**
 * sphinx-build executable: `SPHINX_EXECUTABLE` if set, otherwise the one on PATH.
 */
export function findSphinx(env: EnvSnapshot): string {
  const override = env.SPHINX_EXECUTABLE;
  return override !== undefined && override !== '' ? override : DEFAULT_SPHINX_COMMAND;
}

export function buildSphinxArgs(
  paths: PathConfig,
  confDir: string,
  builder: string = 'html'
): string[] {
  // -c: conf.py comes from confDir, not from the docs source
  return ['-b', builder, '-c', confDir, paths.docsSourceDir, paths.htmlOutputDir];
}

/**
 * The directories exported to the renderer's environment, so conf-level
 * extensions and theme templates can find them.
 */
export function sphinxEnvironment(paths: PathConfig, base: EnvSnapshot): NodeJS.ProcessEnv {
  return {
    ...base,
    [PATH_ENV_VARS.docsSourceDir]: paths.docsSourceDir,
    [PATH_ENV_VARS.codeSourceDir]: paths.codeSourceDir,
    [PATH_ENV_VARS.doxygenOutputDir]: paths.doxygenOutputDir,
    [PATH_ENV_VARS.htmlOutputDir]: paths.htmlOutputDir,
  };
}

export function runSphinx(
  paths: PathConfig,
  config: Readonly<RenderConfig>,
  options: SphinxOptions = {}
): void {
  const base = options.env ?? process.env;
  const command = options.command ?? findSphinx(base);
  const runner = options.runner ?? spawnRunner;
  const confDir = options.confDir ?? defaultConfDir(paths);
  const confPath = writeConfPy(confDir, config);
  const args = buildSphinxArgs(paths, confDir, options.builder);

  console.log(`Running Sphinx. Source dir is '${paths.docsSourceDir}'. Output dir is '${paths.htmlOutputDir}'.`);
  if (options.verbose) {
    console.log(`Wrote ${confPath}`);
    console.log(`${command} ${args.join(' ')}`);
  }

  const result = runner(command, args, { env: sphinxEnvironment(paths, base) });

  if (result.error) {
    throw new RendererLaunchError(command, result.error);
  }

  if (result.status !== 0) {
    throw new RendererExitError(result.status, result.signal);
  }
}
