/**
 * Core Domain
 *
 * Exports navigation, bouquet builder and flower draft domain types.
 */

// Navigation session & screen identifiers
export * from './navigation.js';

// Bouquet builder step machine
export * from './bouquet.js';

// Admin flower draft step machine
export * from './flower-draft.js';
