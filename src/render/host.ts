import type { PathConfig } from '../config/paths.js';
import type { ProjectMetadata } from '../config/project.js';
import type { RenderConfig } from './config.js';

export type LifecycleEvent = 'builder-inited';

export interface BuildContext {
  project: ProjectMetadata;
  paths: PathConfig;
  config: Readonly<RenderConfig>;
}

export type LifecycleHook = (context: BuildContext) => void;

/**
 * The renderer's lifecycle, reduced to the one point docbridge hooks into:
 * `builder-inited`, after configuration is known and before any document is
 * read. Hooks run synchronously, in registration order; a throwing hook
 * aborts the build.
 */
export class RendererHost {
  private readonly hooks = new Map<LifecycleEvent, LifecycleHook[]>();

  connect(event: LifecycleEvent, hook: LifecycleHook): void {
    const registered = this.hooks.get(event) ?? [];
    registered.push(hook);
    this.hooks.set(event, registered);
  }

  emit(event: LifecycleEvent, context: BuildContext): void {
    for (const hook of this.hooks.get(event) ?? []) {
      hook(context);
    }
  }

  listenerCount(event: LifecycleEvent): number {
    return this.hooks.get(event)?.length ?? 0;
  }
}
