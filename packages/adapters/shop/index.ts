/**
 * Shop Adapters
 *
 * In-memory catalog, cart, order history and user directory.
 */

export { InMemoryShop, type InMemoryShopOptions } from './in-memory-shop.js';

export { SAMPLE_FLOWERS, SAMPLE_PRESETS } from './seed.js';
