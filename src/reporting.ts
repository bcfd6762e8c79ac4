import { resolvePaths } from './config/index.js';
import { buildDocs, type BuildOptions, type BuildResult } from './pipeline.js';
import { scanHeaders } from './utils/files.js';

export interface ReportOptions {
  /** Count the headers before building. */
  verbose?: boolean;
  /** Print timings after building. */
  stats?: boolean;
}

/**
 * Run one build and print the outcome the way every CLI command does.
 */
export function buildWithReport(options: BuildOptions, report: ReportOptions = {}): BuildResult {
  if (report.verbose) {
    const paths = resolvePaths(options.env, options.referenceDir);
    const headers = scanHeaders(paths.codeSourceDir);
    console.log(`Found ${headers.length} headers under ${paths.codeSourceDir}`);
  }

  const result = buildDocs(options);

  if (result.htmlOutputDir) {
    console.log(`\n✅ Documentation built: ${result.htmlOutputDir}`);
  } else {
    console.log(`\n✅ Doxygen XML written to: ${result.paths.doxygenOutputDir}`);
  }

  if (report.stats) {
    console.log('\n=== Build Statistics ===');
    if (result.extraction) {
      console.log(`Doxygen: ${result.extraction.durationMs}ms`);
    }
    console.log(`Total: ${(result.durationMs / 1000).toFixed(2)}s`);
  }

  return result;
}
