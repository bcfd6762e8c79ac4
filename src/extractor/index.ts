/**
 * Doxygen extraction step: directive generation and the blocking run.
 */

export { buildDirectives, serializeDirectives, formatDirective, type Directive, type DirectiveKey } from './directives.js';
export { runExtraction, DEFAULT_DOXYGEN_COMMAND, type ExtractionOptions, type ExtractionResult } from './orchestrator.js';
export { spawnRunner, type ProcessRunner, type ProcessResult, type RunOptions } from './runner.js';
