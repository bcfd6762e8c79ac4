#!/usr/bin/env node

import { Command } from 'commander';
import { resolve, dirname, join } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { BuildOptions, BuildResult } from './pipeline.js';
import { buildWithReport } from './reporting.js';
import { resolvePaths, PROJECT } from './config/index.js';
import { buildDirectives, serializeDirectives } from './extractor/index.js';
import { createRenderConfig } from './render/index.js';
import { startPreviewServer } from './server.js';
import { watchSources } from './watcher.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

interface BuildCommandOptions {
  extractOnly?: boolean;
  doxygen?: string;
  sphinx?: string;
  verify: boolean;
  verbose?: boolean;
  stats?: boolean;
}

const program = new Command();

program
  .name('docbridge')
  .description('Run Doxygen over a C++ library and render the result with Sphinx and Breathe')
  .version(packageJson.version);

function toBuildOptions(directory: string | undefined, options: BuildCommandOptions): BuildOptions {
  return {
    referenceDir: resolve(directory ?? '.'),
    env: process.env,
    extractOnly: options.extractOnly,
    doxygenCommand: options.doxygen,
    sphinxCommand: options.sphinx,
    verifyOutput: options.verify,
    verbose: options.verbose,
  };
}

function runBuild(directory: string | undefined, options: BuildCommandOptions): BuildResult {
  return buildWithReport(toBuildOptions(directory, options), options);
}

function addBuildOptions(command: Command): Command {
  return command
    .option('--doxygen <path>', 'Doxygen executable (default: $DOXYGEN_EXECUTABLE or doxygen)')
    .option('--no-verify', 'Don\'t check that Doxygen produced an XML index')
    .option('--verbose', 'Show the Doxygen configuration and tool command lines')
    .option('--stats', 'Print timing statistics at the end');
}

addBuildOptions(
  program
    .command('build')
    .description('Extract the interface with Doxygen, then render the HTML site with Sphinx')
    .argument('[docs-dir]', 'Documentation directory that default paths are relative to')
    .option('--extract-only', 'Stop after the Doxygen step')
    .option('--sphinx <path>', 'sphinx-build executable (default: $SPHINX_EXECUTABLE or sphinx-build)')
).action((directory: string | undefined, options: BuildCommandOptions) => {
  try {
    runBuild(directory, options);
  } catch (err) {
    console.error('Error building documentation:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
});

addBuildOptions(
  program
    .command('extract')
    .description('Run only the Doxygen step')
    .argument('[docs-dir]', 'Documentation directory that default paths are relative to')
).action((directory: string | undefined, options: BuildCommandOptions) => {
  try {
    runBuild(directory, { ...options, extractOnly: true });
  } catch (err) {
    console.error('Error extracting documentation:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
});

program
  .command('config')
  .description('Print the resolved paths and renderer configuration')
  .argument('[docs-dir]', 'Documentation directory that default paths are relative to')
  .option('--doxyfile', 'Print the Doxygen directives instead')
  .option('--json', 'Print as JSON')
  .action((directory: string | undefined, options: { doxyfile?: boolean; json?: boolean }) => {
    const paths = resolvePaths(process.env, resolve(directory ?? '.'));

    if (options.doxyfile) {
      console.log(serializeDirectives(buildDirectives(PROJECT, paths)));
      return;
    }

    const config = createRenderConfig(PROJECT, paths);

    if (options.json) {
      console.log(JSON.stringify({ paths, config }, null, 2));
      return;
    }

    console.log('=== Paths ===');
    for (const [name, value] of Object.entries(paths)) {
      console.log(`${name}: ${value}`);
    }
    console.log('\n=== Renderer ===');
    for (const [name, value] of Object.entries(config)) {
      console.log(`${name}: ${JSON.stringify(value)}`);
    }
  });

addBuildOptions(
  program
    .command('serve')
    .description('Build, serve the HTML site and rebuild when sources change')
    .argument('[docs-dir]', 'Documentation directory that default paths are relative to')
    .option('--sphinx <path>', 'sphinx-build executable (default: $SPHINX_EXECUTABLE or sphinx-build)')
    .option('-p, --port <number>', 'Server port', '8000')
    .option('--no-open', 'Don\'t auto-open browser')
).action(async (directory: string | undefined, options: BuildCommandOptions & { port: string; open: boolean }) => {
  try {
    const { paths } = runBuild(directory, options);

    const preview = await startPreviewServer(paths.htmlOutputDir, parseInt(options.port, 10), options.open);

    const watcher = watchSources(
      [paths.codeSourceDir, paths.docsSourceDir],
      {
        onChange: (filePath) => {
          console.error(`Source changed: ${filePath} — rebuilding...`);
          try {
            runBuild(directory, options);
            preview.broadcastRefresh();
          } catch (error) {
            // Keep serving the last good build
            console.error(`Rebuild failed: ${error instanceof Error ? error.message : error}`);
          }
        },
      },
      [paths.doxygenOutputDir, paths.htmlOutputDir]
    );

    process.on('SIGINT', () => {
      console.error('\nShutting down preview server...');
      watcher
        .close()
        .then(() => preview.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  } catch (err) {
    console.error('Error serving documentation:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
});

program.parse();
