/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the application.
 * Ports define the boundaries between the core domain and external adapters.
 */

// Session Store Interface
export * from './session-store.js';

// Screen Renderer Contract
export * from './screen-renderer.js';

// Shop Collaborators
export * from './shop-services.js';
