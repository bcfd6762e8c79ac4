import { runExtraction, type ExtractionOptions, type ExtractionResult } from '../extractor/orchestrator.js';
import type { RendererHost } from './host.js';

export interface SetupOptions extends ExtractionOptions {
  /** Receives the extraction result once Doxygen has finished. */
  onExtracted?: (result: ExtractionResult) => void;
}

/**
 * Run Doxygen after the renderer is initialized.
 */
export function setup(host: RendererHost, options: SetupOptions = {}): void {
  const { onExtracted, ...extractionOptions } = options;

  host.connect('builder-inited', ({ project, paths }) => {
    const result = runExtraction(project, paths, extractionOptions);
    onExtracted?.(result);
  });
}
