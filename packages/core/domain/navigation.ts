/**
 * Navigation Domain Types
 *
 * Screen identifiers, the per-user navigation session and the errors raised
 * while resolving screens.
 *
 * A session records the screens a user walked through as a LIFO stack.
 * There is no declared transition graph: any screen may link to any other,
 * and "back" is always the literal reverse of the path taken.
 */

import type { BouquetFlowState } from './bouquet.js';
import type { FlowerDraftState } from './flower-draft.js';

// =============================================================================
// Screen Identifiers
// =============================================================================

/**
 * Statically known screens.
 */
export enum ScreenId {
  /** Main menu (top-level) */
  HOME = 'home',
  AI_MENU = 'ai_menu',
  CATALOG = 'catalog',
  CART = 'cart',
  HISTORY = 'history',
  RECOMMEND_PRESETS = 'recommend_presets',
  /** Admin panel root, entered only through the admin command */
  ADMIN_MAIN = 'admin_main',
  ADMIN_LIST_FLOWERS = 'admin_list_flowers',
  ADMIN_ORDERS = 'admin_orders',
  ADMIN_USERS = 'admin_users',
}

/**
 * Prefix of dynamically named recommendation result screens.
 */
export const PRESET_SCREEN_PREFIX = 'preset:';

/**
 * Result screen for a single recommendation preset, e.g. `preset:birthday`.
 */
export type PresetScreenId = `preset:${string}`;

/**
 * Any screen a session can point at.
 */
export type ScreenKey = ScreenId | PresetScreenId;

export const HOME_SCREEN: ScreenKey = ScreenId.HOME;

const STATIC_SCREENS: ReadonlySet<string> = new Set(Object.values(ScreenId));

const ADMIN_SCREENS: ReadonlySet<ScreenKey> = new Set<ScreenKey>([
  ScreenId.ADMIN_MAIN,
  ScreenId.ADMIN_LIST_FLOWERS,
  ScreenId.ADMIN_ORDERS,
  ScreenId.ADMIN_USERS,
]);

export function isPresetScreen(value: string): value is PresetScreenId {
  return value.startsWith(PRESET_SCREEN_PREFIX) && value.length > PRESET_SCREEN_PREFIX.length;
}

/**
 * Narrow an untrusted string (e.g. callback data) to a screen key.
 */
export function isScreenKey(value: string): value is ScreenKey {
  return STATIC_SCREENS.has(value) || isPresetScreen(value);
}

export function isAdminScreen(screen: ScreenKey): boolean {
  return ADMIN_SCREENS.has(screen);
}

export function presetScreen(presetId: string): PresetScreenId {
  return `${PRESET_SCREEN_PREFIX}${presetId}`;
}

/**
 * Extract the preset id from a result screen key.
 */
export function presetIdOf(screen: PresetScreenId): string {
  return screen.slice(PRESET_SCREEN_PREFIX.length);
}

// =============================================================================
// Session
// =============================================================================

/**
 * Opaque user identifier as delivered by the transport.
 */
export type UserId = string | number;

/**
 * Complete per-user mutable state.
 *
 * Mutated only by the single in-flight operation for that user.
 */
export interface NavigationSession {
  /** Normalised user key */
  userId: string;
  /** Screen currently displayed */
  currentScreen: ScreenKey;
  /** Previously displayed screens, most recent last. Empty at home. */
  navStack: ScreenKey[];
  /** Active bouquet builder, independent of the stack */
  guidedFlow: BouquetFlowState | null;
  /** Admin catalog entry being typed in, independent of the stack */
  flowerDraft: FlowerDraftState | null;
  createdAt: Date;
  lastActiveAt: Date;
}

/**
 * Read-only view handed to renderers.
 */
export interface SessionSnapshot {
  readonly userId: string;
  readonly currentScreen: ScreenKey;
  readonly navStack: readonly ScreenKey[];
  readonly guidedFlow: Readonly<BouquetFlowState> | null;
  readonly flowerDraft: Readonly<FlowerDraftState> | null;
}

export function toSessionKey(userId: UserId): string {
  return String(userId);
}

export function createSession(userId: UserId, now: Date = new Date()): NavigationSession {
  return {
    userId: toSessionKey(userId),
    currentScreen: HOME_SCREEN,
    navStack: [],
    guidedFlow: null,
    flowerDraft: null,
    createdAt: now,
    lastActiveAt: now,
  };
}

/**
 * Build a frozen copy of the session so renderers cannot mutate navigation state.
 */
export function snapshotSession(session: NavigationSession): SessionSnapshot {
  const flow = session.guidedFlow;
  const draft = session.flowerDraft;
  return Object.freeze({
    userId: session.userId,
    currentScreen: session.currentScreen,
    navStack: Object.freeze([...session.navStack]),
    guidedFlow: flow
      ? Object.freeze({
          ...flow,
          fields: Object.freeze({
            ...flow.fields,
            ...(flow.fields.addons ? { addons: [...flow.fields.addons] } : {}),
          }),
          addonDraft: [...flow.addonDraft],
        })
      : null,
    flowerDraft: draft ? Object.freeze({ ...draft, fields: Object.freeze({ ...draft.fields }) }) : null,
  });
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a screen id was never registered.
 * Indicates a wiring defect; callers fall back to the home screen.
 */
export class UnknownScreenError extends Error {
  readonly screenId: string;

  constructor(screenId: string) {
    super(`Screen '${screenId}' is not registered`);
    this.name = 'UnknownScreenError';
    this.screenId = screenId;
  }
}
