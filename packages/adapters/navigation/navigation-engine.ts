/**
 * NavigationEngine
 *
 * Per-session LIFO screen stack. Forward links push the screen being left;
 * "back" pops it. The stack is recorded as a side effect of navigation, there
 * is no static transition table.
 *
 * Stack operations never touch the guided flows, except reset which abandons them.
 */

import type { Logger } from 'pino';
import type { NavigationSession, ScreenKey } from '@petal/core/domain';
import { HOME_SCREEN, UnknownScreenError, snapshotSession } from '@petal/core/domain';
import type { RenderContext, RenderedScreen, ScreenRenderer } from '@petal/core/ports';
import { errorPayload } from '@petal/core/ports';
import type { ScreenRegistry } from './screen-registry.js';

// =============================================================================
// Types
// =============================================================================

export interface NavigationEngineOptions {
  registry: ScreenRegistry;
  logger: Logger;
  /** Oldest entries are dropped beyond this depth (default: 32, minimum: 2) */
  maxDepth?: number;
}

export const DEFAULT_MAX_STACK_DEPTH = 32;

/** Two entries keep a two-level enter/back round trip intact */
export const MIN_STACK_DEPTH = 2;

export const RENDER_FAILURE_TEXT =
  '❌ Something went wrong showing this screen. Use /start to return to the main menu.';

// =============================================================================
// Implementation
// =============================================================================

export class NavigationEngine {
  private readonly registry: ScreenRegistry;
  private readonly log: Logger;
  readonly maxDepth: number;

  constructor(options: NavigationEngineOptions) {
    this.registry = options.registry;
    this.log = options.logger.child({ component: 'NavigationEngine' });
    this.maxDepth = Math.max(MIN_STACK_DEPTH, options.maxDepth ?? DEFAULT_MAX_STACK_DEPTH);
  }

  // ===========================================================================
  // Stack Operations
  // ===========================================================================

  /**
   * Follow a forward link. The screen being left becomes reachable via back.
   */
  enter(session: NavigationSession, target: ScreenKey): void {
    const from = session.currentScreen;

    if (target === HOME_SCREEN) {
      // Home is never kept as a bottom sentinel
      session.navStack.length = 0;
    } else if (from !== target) {
      session.navStack.push(from);
      if (session.navStack.length > this.maxDepth) {
        session.navStack.splice(0, session.navStack.length - this.maxDepth);
      }
    }

    session.currentScreen = target;
    this.log.debug(
      { userId: session.userId, from, to: target, depth: session.navStack.length },
      'Entered screen'
    );
  }

  /**
   * Return to the previous screen, or home when there is none. Never fails.
   */
  back(session: NavigationSession): ScreenKey {
    const previous = session.navStack.pop() ?? HOME_SCREEN;
    session.currentScreen = previous;
    this.log.debug(
      { userId: session.userId, to: previous, depth: session.navStack.length },
      'Navigated back'
    );
    return previous;
  }

  /**
   * Clear the stack, go home and abandon any guided flow.
   */
  reset(session: NavigationSession): void {
    const hadFlow = session.guidedFlow !== null || session.flowerDraft !== null;
    session.navStack.length = 0;
    session.currentScreen = HOME_SCREEN;
    session.guidedFlow = null;
    session.flowerDraft = null;
    this.log.debug({ userId: session.userId, abandonedFlow: hadFlow }, 'Navigation reset');
  }

  /**
   * Switch screens without recording the one being left.
   */
  rootlessJump(session: NavigationSession, target: ScreenKey): void {
    session.currentScreen = target;
    this.log.debug({ userId: session.userId, to: target }, 'Rootless jump');
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  /**
   * Render the session's current screen.
   *
   * An unregistered screen falls back to home (the session follows, so state
   * matches what is shown). A failing renderer yields an error payload; the
   * session is left as it was.
   */
  async render(session: NavigationSession, context: RenderContext): Promise<RenderedScreen> {
    let screenId: string = session.currentScreen;

    try {
      const renderer = this.resolveOrFallback(session);
      screenId = session.currentScreen;
      const payload = await renderer(snapshotSession(session), context);
      return { screenId, payload };
    } catch (error) {
      this.log.error(
        { userId: session.userId, screenId, error: error instanceof Error ? error.message : String(error) },
        'Screen renderer failed'
      );
      return {
        screenId,
        payload: errorPayload(RENDER_FAILURE_TEXT, [
          [{ label: '🏠 Main menu', action: { type: 'nav_reset' } }],
        ]),
      };
    }
  }

  private resolveOrFallback(session: NavigationSession): ScreenRenderer {
    try {
      return this.registry.resolve(session.currentScreen);
    } catch (error) {
      if (!(error instanceof UnknownScreenError)) {
        throw error;
      }
      this.log.error(
        { userId: session.userId, screenId: error.screenId },
        'Unknown screen requested, falling back to home (configuration defect)'
      );
      session.currentScreen = HOME_SCREEN;
      session.navStack.length = 0;
      return this.registry.resolve(HOME_SCREEN);
    }
  }
}
