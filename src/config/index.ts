export { resolvePaths, PATH_ENV_VARS, DEFAULT_PATHS, type PathConfig, type EnvSnapshot } from './paths.js';
export { PROJECT, type ProjectMetadata } from './project.js';
