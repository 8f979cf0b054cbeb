/**
 * Buttons shared by the dispatcher and the flow presenters.
 */

import type { ActionButton } from '@petal/core/ports';

/** Uniform back, attached to every payload except home's */
export const BACK_BUTTON: ActionButton = { label: '◀️ Back', action: { type: 'nav_back' } };

export const MAIN_MENU_BUTTON: ActionButton = { label: '🏠 Main menu', action: { type: 'nav_reset' } };
