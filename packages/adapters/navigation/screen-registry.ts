/**
 * ScreenRegistry
 *
 * Lookup table from screen id to renderer. Filled at startup (feature modules
 * may register in any order, and later registrations replace earlier ones),
 * read by the navigation engine afterwards.
 */

import type { Logger } from 'pino';
import type { ScreenKey } from '@petal/core/domain';
import { UnknownScreenError } from '@petal/core/domain';
import type { ScreenRenderer } from '@petal/core/ports';

export class ScreenRegistry {
  private readonly renderers = new Map<ScreenKey, ScreenRenderer>();
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'ScreenRegistry' });
  }

  /**
   * Register a renderer. Re-registering an id replaces the renderer.
   */
  register(screenId: ScreenKey, renderer: ScreenRenderer): void {
    const replaced = this.renderers.has(screenId);
    this.renderers.set(screenId, renderer);
    this.log.debug({ screenId, replaced }, 'Screen registered');
  }

  /**
   * @throws UnknownScreenError if the id was never registered
   */
  resolve(screenId: ScreenKey): ScreenRenderer {
    const renderer = this.renderers.get(screenId);
    if (!renderer) {
      throw new UnknownScreenError(screenId);
    }
    return renderer;
  }

  has(screenId: ScreenKey): boolean {
    return this.renderers.has(screenId);
  }

  list(): ScreenKey[] {
    return Array.from(this.renderers.keys());
  }
}
