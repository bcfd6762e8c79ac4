export { createRenderConfig, renderConfPy, toPythonLiteral, type RenderConfig, type RenderValue, type ThemeOptions } from './config.js';
export { RendererHost, type BuildContext, type LifecycleEvent, type LifecycleHook } from './host.js';
export { setup, type SetupOptions } from './setup.js';
export { runSphinx, findSphinx, buildSphinxArgs, sphinxEnvironment, defaultConfDir, writeConfPy, DEFAULT_SPHINX_COMMAND, type SphinxOptions } from './sphinx.js';
