/**
 * Screen Registration
 *
 * Binds every statically known screen to its renderer and attaches one
 * result screen per recommendation preset.
 */

import type { ScreenRegistry } from '@petal/adapters/navigation';
import { ScreenId, presetScreen } from '@petal/core/domain';
import type { ICatalogService, ScreenRenderer } from '@petal/core/ports';
import { renderAdminFlowers, renderAdminMain, renderAdminOrders, renderAdminUsers } from './admin.js';
import { createPresetRenderer, renderAiMenu, renderHome, renderRecommendPresets } from './home.js';
import { renderCart, renderCatalog, renderHistory } from './shop.js';

/**
 * Closed set of screens; the compiler flags a screen id without a renderer.
 */
export const STATIC_SCREENS: Record<ScreenId, ScreenRenderer> = {
  [ScreenId.HOME]: renderHome,
  [ScreenId.AI_MENU]: renderAiMenu,
  [ScreenId.CATALOG]: renderCatalog,
  [ScreenId.CART]: renderCart,
  [ScreenId.HISTORY]: renderHistory,
  [ScreenId.RECOMMEND_PRESETS]: renderRecommendPresets,
  [ScreenId.ADMIN_MAIN]: renderAdminMain,
  [ScreenId.ADMIN_LIST_FLOWERS]: renderAdminFlowers,
  [ScreenId.ADMIN_ORDERS]: renderAdminOrders,
  [ScreenId.ADMIN_USERS]: renderAdminUsers,
};

export function registerAllScreens(registry: ScreenRegistry): void {
  for (const screenId of Object.values(ScreenId)) {
    registry.register(screenId, STATIC_SCREENS[screenId]);
  }
}

/**
 * Register a result screen for each preset currently in the catalog.
 *
 * @returns Number of preset screens registered
 */
export async function registerPresetScreens(
  registry: ScreenRegistry,
  catalog: ICatalogService
): Promise<number> {
  const presets = await catalog.listPresets();
  for (const preset of presets) {
    registry.register(presetScreen(preset.id), createPresetRenderer(preset.id));
  }
  return presets.length;
}
