/**
 * Screen Renderer Contract
 *
 * Boundary between the navigation engine and the code that draws screens.
 * Renderers receive a frozen session snapshot plus the render context and
 * return a transport-agnostic display payload: text and the actions the user
 * can take from there.
 */

import type { ScreenKey, SessionSnapshot } from '../domain/navigation.js';
import type { ShopServices } from './shop-services.js';

// =============================================================================
// Inbound Actions
// =============================================================================

/**
 * Action a user can trigger. Emitted by the transport and carried by buttons.
 */
export type InboundAction =
  | { type: 'enter_screen'; target: ScreenKey }
  | { type: 'nav_back' }
  | { type: 'nav_reset' }
  | { type: 'admin_entry' }
  | { type: 'guided_start' }
  | { type: 'guided_advance'; value: string | readonly string[] }
  | { type: 'guided_toggle'; value: string }
  | { type: 'guided_back' }
  | { type: 'guided_finalize' }
  | { type: 'cart_clear' }
  | { type: 'flower_draft_start' }
  | { type: 'flower_draft_input'; value: string }
  | { type: 'flower_draft_back' }
  | { type: 'flower_draft_save' }
  | { type: 'flower_draft_cancel' };

export type InboundActionType = InboundAction['type'];

// =============================================================================
// Display Payload
// =============================================================================

/**
 * Button that dispatches an action when pressed.
 */
export interface ActionButton {
  label: string;
  action: InboundAction;
}

/**
 * Button that opens an external page (Telegram Web App).
 */
export interface LinkButton {
  label: string;
  url: string;
}

export type PayloadButton = ActionButton | LinkButton;

export function isLinkButton(button: PayloadButton): button is LinkButton {
  return 'url' in button;
}

/**
 * What the user sees: text and rows of buttons.
 *
 * `error` payloads are produced when a collaborator failed or a request was
 * refused; they still carry actions so the user can recover.
 */
export interface DisplayPayload {
  kind: 'content' | 'error';
  text: string;
  buttons: PayloadButton[][];
}

export function contentPayload(text: string, buttons: PayloadButton[][] = []): DisplayPayload {
  return { kind: 'content', text, buttons };
}

export function errorPayload(text: string, buttons: PayloadButton[][] = []): DisplayPayload {
  return { kind: 'error', text, buttons };
}

// =============================================================================
// Renderer
// =============================================================================

/**
 * Public profile of the user being served.
 */
export interface UserProfile {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

/**
 * Everything a renderer may consult besides the session.
 */
export interface RenderContext {
  /** Present when the transport knows who the user is */
  profile?: UserProfile;
  services: ShopServices;
  /** Telegram Web App catalog URL */
  webAppUrl: string;
}

/**
 * Pure function of session and context. May await collaborators; a rejection
 * is turned into an error payload by the engine.
 */
export type ScreenRenderer = (
  session: SessionSnapshot,
  context: RenderContext
) => Promise<DisplayPayload>;

/**
 * Screen id paired with what to show for it.
 */
export interface RenderedScreen {
  screenId: string;
  payload: DisplayPayload;
}
