import type { PathConfig } from '../config/paths.js';
import type { ProjectMetadata } from '../config/project.js';

export type RenderScalar = string | boolean;
export type RenderValue = RenderScalar | string[] | Record<string, RenderScalar | string[]>;

export interface ThemeOptions extends Record<string, RenderScalar> {
  description: string;
  github_user: string;
  github_repo: string;
  github_button: boolean;
  font_family: string;
  head_font_family: string;
}

/**
 * Settings handed to sphinx-build. Keys use Sphinx's own option names.
 */
export interface RenderConfig extends Record<string, RenderValue> {
  project: string;
  master_doc: string;
  extensions: string[];
  breathe_projects: Record<string, string>;
  breathe_default_project: string;
  breathe_domain_by_file_pattern: Record<string, string>;
  html_theme: string;
  html_theme_options: ThemeOptions;
  pygments_style: string;
  html_sidebars: Record<string, string[]>;
}

const FONT_STACK = 'Helvetica, Arial, sans-serif';

export function createRenderConfig(
  project: ProjectMetadata,
  paths: Pick<PathConfig, 'doxygenOutputDir'>
): Readonly<RenderConfig> {
  return Object.freeze({
    project: project.name,
    master_doc: project.masterDoc,

    extensions: ['breathe'],
    breathe_projects: { [project.breatheProject]: paths.doxygenOutputDir },
    breathe_default_project: project.breatheProject,
    breathe_domain_by_file_pattern: { '*': 'cpp' },

    html_theme: 'alabaster',
    html_theme_options: {
      description: project.description,
      github_user: project.githubUser,
      github_repo: project.githubRepo,
      github_button: true,
      font_family: FONT_STACK,
      head_font_family: FONT_STACK,
    },
    pygments_style: 'xcode',
    html_sidebars: { '**': ['globaltoc.html', 'searchbox.html'] },
  });
}

/**
 * Python source for a single value. JSON string escapes are valid Python
 * string escapes, so strings go through JSON.stringify.
 */
export function toPythonLiteral(value: RenderValue): string {
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'string') return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(toPythonLiteral).join(', ')}]`;

  const entries = Object.entries(value).map(
    ([key, entry]) => `${JSON.stringify(key)}: ${toPythonLiteral(entry)}`
  );
  return `{${entries.join(', ')}}`;
}

export const CONF_PY_HEADER = '# Generated by docbridge; rewritten on every build.';

/**
 * The render configuration as a Sphinx `conf.py`, one assignment per option
 * in declaration order.
 */
export function renderConfPy(config: Readonly<Record<string, RenderValue>>): string {
  const lines = Object.entries(config).map(([name, value]) => `${name} = ${toPythonLiteral(value)}`);
  return [CONF_PY_HEADER, '', ...lines, ''].join('\n');
}
