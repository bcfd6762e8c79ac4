import type { PathConfig } from '../config/paths.js';
import type { ProjectMetadata } from '../config/project.js';

export type DirectiveKey =
  | 'PROJECT_NAME'
  | 'GENERATE_XML'
  | 'INPUT'
  | 'OUTPUT_DIRECTORY'
  | 'XML_OUTPUT'
  | 'RECURSIVE'
  | 'GENERATE_HTML'
  | 'GENERATE_LATEX'
  | 'QUIET';

export interface Directive {
  key: DirectiveKey;
  value: string;
}

/**
 * Doxygen configuration for an XML-only run over the library headers.
 * INPUT, OUTPUT_DIRECTORY and XML_OUTPUT carry the resolved paths unchanged
 * so the XML lands where Breathe looks for it.
 */
export function buildDirectives(
  project: Pick<ProjectMetadata, 'name'>,
  paths: Pick<PathConfig, 'codeSourceDir' | 'doxygenOutputDir'>
): Directive[] {
  return [
    { key: 'PROJECT_NAME', value: `"${project.name}"` },
    { key: 'GENERATE_XML', value: 'YES' },
    { key: 'INPUT', value: paths.codeSourceDir },
    { key: 'OUTPUT_DIRECTORY', value: paths.doxygenOutputDir },
    { key: 'XML_OUTPUT', value: paths.doxygenOutputDir },
    { key: 'RECURSIVE', value: 'YES' },
    { key: 'GENERATE_HTML', value: 'NO' },
    { key: 'GENERATE_LATEX', value: 'NO' },
    { key: 'QUIET', value: 'YES' },
  ];
}

export function formatDirective(directive: Directive): string {
  return `${directive.key} = ${directive.value}`;
}

export function serializeDirectives(directives: Directive[]): string {
  return directives.map(formatDirective).join('\n');
}
