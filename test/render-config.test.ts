import { describe, it, expect } from 'vitest';
import { resolvePaths } from '../src/config/paths.js';
import { PROJECT } from '../src/config/project.js';
import { buildDirectives } from '../src/extractor/directives.js';
import { createRenderConfig, renderConfPy, toPythonLiteral } from '../src/render/config.js';

describe('createRenderConfig', () => {
  const paths = resolvePaths({}, '/repo/docs');
  const config = createRenderConfig(PROJECT, paths);

  it('declares the project metadata', () => {
    expect(config.project).toBe('Observable');
    expect(config.master_doc).toBe('index');
  });

  it('points Breathe at the Doxygen output directory', () => {
    expect(config.extensions).toEqual(['breathe']);
    expect(config.breathe_projects).toEqual({ observable: '/repo/docs/doxygen' });
    expect(config.breathe_default_project).toBe('observable');
    expect(config.breathe_domain_by_file_pattern).toEqual({ '*': 'cpp' });
  });

  it('keeps the Breathe binding consistent with the extractor run', () => {
    const overridden = resolvePaths({ DOXYGEN_OUTPUT_DIR: '/tmp/out' }, '/repo/docs');
    const overriddenConfig = createRenderConfig(PROJECT, overridden);
    const xmlOutput = buildDirectives(PROJECT, overridden).find(d => d.key === 'XML_OUTPUT');

    expect(overriddenConfig.breathe_projects[overriddenConfig.breathe_default_project]).toBe(xmlOutput?.value);
  });

  it('configures the alabaster theme', () => {
    expect(config.html_theme).toBe('alabaster');
    expect(config.html_theme_options).toEqual({
      description: 'Generic observable objects for C++',
      github_user: 'ddinu',
      github_repo: 'observable',
      github_button: true,
      font_family: 'Helvetica, Arial, sans-serif',
      head_font_family: 'Helvetica, Arial, sans-serif',
    });
    expect(config.pygments_style).toBe('xcode');
    expect(config.html_sidebars).toEqual({ '**': ['globaltoc.html', 'searchbox.html'] });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('toPythonLiteral', () => {
  it('writes booleans as Python constants', () => {
    expect(toPythonLiteral(true)).toBe('True');
    expect(toPythonLiteral(false)).toBe('False');
  });

  it('escapes quotes and backslashes in strings', () => {
    expect(toPythonLiteral('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });

  it('keeps lists as lists inside mappings', () => {
    expect(toPythonLiteral({ '**': ['globaltoc.html', 'searchbox.html'] })).toBe(
      '{"**": ["globaltoc.html", "searchbox.html"]}'
    );
  });
});

describe('renderConfPy', () => {
  it('writes one typed assignment per option in declaration order', () => {
    const config = createRenderConfig(PROJECT, resolvePaths({}, '/repo/docs'));

    expect(renderConfPy(config)).toBe(
      [
        '# Generated by docbridge; rewritten on every build.',
        '',
        'project = "Observable"',
        'master_doc = "index"',
        'extensions = ["breathe"]',
        'breathe_projects = {"observable": "/repo/docs/doxygen"}',
        'breathe_default_project = "observable"',
        'breathe_domain_by_file_pattern = {"*": "cpp"}',
        'html_theme = "alabaster"',
        'html_theme_options = {"description": "Generic observable objects for C++", "github_user": "ddinu", ' +
          '"github_repo": "observable", "github_button": True, "font_family": "Helvetica, Arial, sans-serif", ' +
          '"head_font_family": "Helvetica, Arial, sans-serif"}',
        'pygments_style = "xcode"',
        'html_sidebars = {"**": ["globaltoc.html", "searchbox.html"]}',
        '',
      ].join('\n')
    );
  });
});
