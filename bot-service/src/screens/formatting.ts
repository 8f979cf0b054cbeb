/**
 * Text helpers shared by screen renderers.
 */

import type { AddonId, ColorId, QuantityOption, ScreenKey } from '@petal/core/domain';
import { ADDON_OPTIONS, COLOR_OPTIONS } from '@petal/core/domain';
import type { ActionButton, CartItem, LinkButton } from '@petal/core/ports';

/** Telegram rejects messages longer than 4096 characters */
export const MAX_MESSAGE_LENGTH = 4000;

export function formatPrice(amount: number): string {
  return `${amount}₽`;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function colorLabel(color: ColorId): string {
  return COLOR_OPTIONS.find((option) => option.id === color)?.label ?? color;
}

export function quantityLabel(quantity: QuantityOption): string {
  return `${quantity} stems`;
}

export function addonsLabel(addons: readonly AddonId[]): string {
  if (addons.length === 0) {
    return 'none';
  }
  return addons
    .map((addon) => ADDON_OPTIONS.find((option) => option.id === addon)?.label ?? addon)
    .join(', ');
}

export function describeCartItem(item: CartItem, position: number): string {
  if (item.type === 'catalog') {
    return `${position}. ${item.name} — ${formatPrice(item.price)}`;
  }
  return (
    `${position}. Custom bouquet\n` +
    `   Colour: ${colorLabel(item.color)}\n` +
    `   Stems: ${item.quantity}\n` +
    `   Add-ons: ${addonsLabel(item.addons)}\n` +
    `   Price: ${formatPrice(item.price)}`
  );
}

/**
 * Cut text to the message limit, appending a notice when shortened.
 */
export function truncate(text: string, notice: string, limit: number = MAX_MESSAGE_LENGTH): string {
  return text.length > limit ? `${text.slice(0, limit)}\n\n${notice}` : text;
}

// =============================================================================
// Buttons
// =============================================================================

export function go(label: string, target: ScreenKey): ActionButton {
  return { label, action: { type: 'enter_screen', target } };
}

export function buildBouquetButton(label = '🎨 Build a bouquet'): ActionButton {
  return { label, action: { type: 'guided_start' } };
}

export function link(label: string, url: string): LinkButton {
  return { label, url };
}

export function addFlowerButton(): ActionButton {
  return { label: '➕ Add flower', action: { type: 'flower_draft_start' } };
}

export function clearCartButton(): ActionButton {
  return { label: '🗑️ Clear cart', action: { type: 'cart_clear' } };
}
