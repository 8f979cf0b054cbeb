/**
 * Navigation Adapters
 *
 * - ScreenRegistry - screen id → renderer lookup
 * - NavigationEngine - per-session screen stack and rendering
 */

export { ScreenRegistry } from './screen-registry.js';

export {
  NavigationEngine,
  DEFAULT_MAX_STACK_DEPTH,
  RENDER_FAILURE_TEXT,
  type NavigationEngineOptions,
} from './navigation-engine.js';
