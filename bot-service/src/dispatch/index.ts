export { NavigationDispatcher, ADMIN_DENIED_TEXT, CART_CLEARED_TEXT } from './NavigationDispatcher.js';
export { BACK_BUTTON, MAIN_MENU_BUTTON } from './buttons.js';
export type { NavigationDispatcherOptions } from './NavigationDispatcher.js';
export { createAdminPolicy } from './types.js';
export type { ActionDispatcher, AdminPolicy, InboundEvent } from './types.js';
