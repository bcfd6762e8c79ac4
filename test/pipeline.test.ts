import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildDocs } from '../src/pipeline.js';
import { ExtractorExitError } from '../src/errors.js';
import type { ProcessRunner } from '../src/extractor/runner.js';

describe('buildDocs', () => {
  let tmpDir: string;
  let docsDir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docbridge-pipeline-'));
    docsDir = path.join(tmpDir, 'docs');
    fs.mkdirSync(docsDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /** Pretends to be doxygen (writes index.xml) and sphinx-build (succeeds). */
  function toolRunner(sphinxStatus = 0) {
    const commands: string[] = [];
    const runner = vi.fn<ProcessRunner>((command) => {
      commands.push(command);
      if (command === 'doxygen') {
        const outputDir = path.join(docsDir, 'doxygen');
        fs.mkdirSync(outputDir, { recursive: true });
        fs.writeFileSync(path.join(outputDir, 'index.xml'), '<doxygenindex/>');
        return { status: 0, signal: null };
      }
      return { status: sphinxStatus, signal: null };
    });
    return { runner, commands };
  }

  it('runs doxygen before sphinx and reports both output directories', () => {
    const { runner, commands } = toolRunner();

    const result = buildDocs({ referenceDir: docsDir, env: {}, runner });

    expect(commands).toEqual(['doxygen', 'sphinx-build']);
    expect(result.paths.codeSourceDir).toBe(path.join(tmpDir, 'include', 'observable'));
    expect(result.htmlOutputDir).toBe(path.join(docsDir, 'html'));
    expect(result.extraction?.directives).toHaveLength(9);
  });

  it('hands sphinx the directory doxygen wrote to', () => {
    const { runner } = toolRunner();

    buildDocs({ referenceDir: docsDir, env: {}, runner });

    const confDir = path.join(docsDir, '.docbridge');
    expect(runner.mock.calls[1][1]).toEqual(['-b', 'html', '-c', confDir, docsDir, path.join(docsDir, 'html')]);

    const confPy = fs.readFileSync(path.join(confDir, 'conf.py'), 'utf-8');
    expect(confPy).toContain(`breathe_projects = {"observable": "${path.join(docsDir, 'doxygen')}"}`);
  });

  it('stops after doxygen when extractOnly is set', () => {
    const { runner, commands } = toolRunner();

    const result = buildDocs({ referenceDir: docsDir, env: {}, runner, extractOnly: true });

    expect(commands).toEqual(['doxygen']);
    expect(result.htmlOutputDir).toBeNull();
  });

  it('never runs sphinx when doxygen fails', () => {
    const runner = vi.fn<ProcessRunner>(() => ({ status: 1, signal: null }));

    expect(() => buildDocs({ referenceDir: docsDir, env: {}, runner })).toThrow(ExtractorExitError);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('takes executables from the environment', () => {
    const runner = vi.fn<ProcessRunner>(() => ({ status: 0, signal: null }));

    buildDocs({
      referenceDir: docsDir,
      env: { DOXYGEN_EXECUTABLE: '/opt/bin/doxygen', SPHINX_EXECUTABLE: '/opt/bin/sphinx-build' },
      runner,
      verifyOutput: false,
    });

    expect(runner.mock.calls.map(call => call[0])).toEqual(['/opt/bin/doxygen', '/opt/bin/sphinx-build']);
  });

  it('lets explicit commands win over the environment', () => {
    const runner = vi.fn<ProcessRunner>(() => ({ status: 0, signal: null }));

    buildDocs({
      referenceDir: docsDir,
      env: { DOXYGEN_EXECUTABLE: '/opt/bin/doxygen' },
      runner,
      verifyOutput: false,
      doxygenCommand: 'doxygen-1.9',
      sphinxCommand: 'sphinx-build-3',
    });

    expect(runner.mock.calls.map(call => call[0])).toEqual(['doxygen-1.9', 'sphinx-build-3']);
  });
});
