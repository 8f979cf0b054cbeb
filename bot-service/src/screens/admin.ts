/**
 * Admin area screens. Access is checked by the dispatcher before any of
 * these are entered.
 */

import { ScreenId } from '@petal/core/domain';
import type { ScreenRenderer } from '@petal/core/ports';
import { contentPayload } from '@petal/core/ports';
import { addFlowerButton, formatDate, formatPrice, go, truncate } from './formatting.js';

const RECENT_LIMIT = 20;

export const renderAdminMain: ScreenRenderer = async () =>
  contentPayload('🔧 Admin panel\n\nChoose an action:', [
    [addFlowerButton()],
    [go('📋 Flowers', ScreenId.ADMIN_LIST_FLOWERS)],
    [go('📦 Orders', ScreenId.ADMIN_ORDERS)],
    [go('👥 Users', ScreenId.ADMIN_USERS)],
  ]);

export const renderAdminFlowers: ScreenRenderer = async (_session, context) => {
  const flowers = await context.services.catalog.listAll();
  if (flowers.length === 0) {
    return contentPayload('📋 The catalog is empty\n\nUse "Add flower" to create the first entry.', [
      [addFlowerButton()],
    ]);
  }

  const text =
    '📋 Flowers:\n\n' +
    flowers
      .map(
        (flower) =>
          `${flower.available ? '✅' : '❌'} ID: ${flower.id}\n` +
          `   Name: ${flower.name}\n` +
          `   Price: ${formatPrice(flower.price)}\n` +
          `   Category: ${flower.category || 'none'}`
      )
      .join('\n\n');

  return contentPayload(truncate(text, '... (list shortened)'));
};

export const renderAdminOrders: ScreenRenderer = async (_session, context) => {
  const orders = await context.services.orders.listRecentOrders(RECENT_LIMIT);
  if (orders.length === 0) {
    return contentPayload('📦 No orders yet');
  }

  const text =
    '📦 Latest orders:\n\n' +
    orders
      .map(
        (order) =>
          `🆔 Order #${order.id}\n` +
          `👤 User ID: ${order.userId}\n` +
          `💰 Total: ${formatPrice(order.totalPrice)}\n` +
          `📍 Address: ${order.deliveryAddress ?? 'not set'}\n` +
          `📊 Status: ${order.status}\n` +
          `📅 Date: ${formatDate(order.createdAt)}`
      )
      .join('\n\n');

  return contentPayload(truncate(text, '... (showing the first orders)'));
};

export const renderAdminUsers: ScreenRenderer = async (_session, context) => {
  const users = await context.services.users.listRecentUsers(RECENT_LIMIT);
  if (users.length === 0) {
    return contentPayload('👥 No users yet');
  }

  const text =
    '👥 Latest users:\n\n' +
    users
      .map((user) => {
        const fullName = [user.firstName, user.lastName].filter(Boolean).join(' ');
        return (
          `🆔 ${user.id}\n` +
          `👤 ${fullName || 'no name'}\n` +
          `📝 ${user.username ? `@${user.username}` : 'no username'}\n` +
          `📅 Registered: ${formatDate(user.registeredAt)}`
        );
      })
      .join('\n\n');

  return contentPayload(truncate(text, '... (showing the first users)'));
};
