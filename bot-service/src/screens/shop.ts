/**
 * Catalog, cart and order history screens.
 */

import { ScreenId } from '@petal/core/domain';
import type { ScreenRenderer } from '@petal/core/ports';
import { contentPayload } from '@petal/core/ports';
import {
  buildBouquetButton,
  clearCartButton,
  describeCartItem,
  formatDate,
  formatPrice,
  go,
  link,
} from './formatting.js';

export const renderCatalog: ScreenRenderer = async (_session, context) => {
  const flowers = await context.services.catalog.listAvailable();

  const listing =
    flowers.length === 0
      ? 'Nothing in stock right now.'
      : flowers
          .map((flower, index) => `${index + 1}. ${flower.name} — ${formatPrice(flower.price)}\n   ${flower.description}`)
          .join('\n');

  return contentPayload(`🌸 Catalog\n\n${listing}`, [
    [link('🛍 Open the shop', context.webAppUrl)],
    [buildBouquetButton()],
  ]);
};

export const renderCart: ScreenRenderer = async (session, context) => {
  const items = await context.services.cart.getItems(session.userId);

  if (items.length === 0) {
    return contentPayload('🛒 Your cart is empty\n\nBuild a bouquet or browse the catalog.', [
      [buildBouquetButton()],
      [go('🌸 Catalog', ScreenId.CATALOG)],
    ]);
  }

  const total = items.reduce((sum, item) => sum + item.price, 0);
  const lines = items.map((item, index) => describeCartItem(item, index + 1)).join('\n\n');

  return contentPayload(`🛒 Your cart:\n\n${lines}\n\n💰 Total: ${formatPrice(total)}`, [
    [buildBouquetButton('🎨 Build another')],
    [go('🌸 Catalog', ScreenId.CATALOG)],
    [clearCartButton()],
  ]);
};

export const renderHistory: ScreenRenderer = async (session, context) => {
  const order = await context.services.orders.getLastOrder(session.userId);

  if (!order) {
    return contentPayload('📜 You have no orders yet.', [[go('🌸 Catalog', ScreenId.CATALOG)]]);
  }

  const items = order.items
    .map((item) => (item.type === 'catalog' ? item.name : 'Custom bouquet'))
    .join(', ');

  return contentPayload(
    '📜 Your last order\n\n' +
      `Order #${order.id} — ${formatPrice(order.totalPrice)}\n` +
      `Status: ${order.status}\n` +
      `Placed: ${formatDate(order.createdAt)}\n` +
      `Items: ${items}`,
    [[go('🌸 Catalog', ScreenId.CATALOG)]]
  );
};
