import chokidar, { type FSWatcher } from 'chokidar';
import { isAbsolute, join, relative, sep } from 'path';
import { isHeaderFile } from './utils/files.js';

export interface WatcherCallbacks {
  onChange: (filePath: string, event: 'add' | 'change' | 'unlink') => void | Promise<void>;
}

const DOC_SOURCE_EXTENSIONS = ['.rst', '.md'];

export function isWatchedFile(filePath: string): boolean {
  return isHeaderFile(filePath) || DOC_SOURCE_EXTENSIONS.some(ext => filePath.endsWith(ext));
}

/**
 * Path of `absolutePath` relative to the most specific root containing it,
 * or the path unchanged when no root contains it.
 */
export function relativeToRoot(roots: string[], absolutePath: string): string {
  let best: string | null = null;

  for (const root of roots) {
    const candidate = relative(root, absolutePath);
    if (candidate === '..' || candidate.startsWith(`..${sep}`) || isAbsolute(candidate)) continue;
    if (best === null || candidate.length < best.length) {
      best = candidate;
    }
  }

  return best ?? absolutePath;
}

/**
 * Watch the header and documentation source trees. Paths handed to the
 * callback are relative to whichever watched root contains them.
 * `ignoredDirs` are absolute directories excluded from watching.
 */
export function watchSources(
  roots: string[],
  callbacks: WatcherCallbacks,
  ignoredDirs: string[] = []
): FSWatcher {
  console.error(`[Watcher] Watching: ${roots.join(', ')}`);

  const watcher = chokidar.watch(roots, {
    ignored: [
      '**/node_modules/**',
      '**/.git/**',
      '**/build/**',
      '**/_build/**',
      '**/.*',
      // Build output often sits inside the docs source tree
      ...ignoredDirs.flatMap(dir => [dir, join(dir, '**')]),
    ],
    ignoreInitial: true,
    persistent: true,
    followSymlinks: false,
    awaitWriteFinish: {
      stabilityThreshold: 300,
      pollInterval: 100,
    },
  });

  const forward = (event: 'add' | 'change' | 'unlink') => (absolutePath: string) => {
    if (!isWatchedFile(absolutePath)) return;

    const relativePath = relativeToRoot(roots, absolutePath);
    console.error(`[Watcher] ${event}: ${relativePath}`);
    Promise.resolve(callbacks.onChange(relativePath, event)).catch((error: unknown) => {
      console.error(`[Watcher] Handler failed for ${relativePath}:`, error);
    });
  };

  watcher.on('add', forward('add'));
  watcher.on('change', forward('change'));
  watcher.on('unlink', forward('unlink'));

  watcher.on('error', (error: unknown) => {
    console.error('[Watcher] Error:', error);
  });

  watcher.on('ready', () => {
    console.error('[Watcher] Ready — watching for changes');
  });

  return watcher;
}
