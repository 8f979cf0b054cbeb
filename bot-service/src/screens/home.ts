/**
 * Main menu and AI recommendation screens.
 */

import type { RecommendationPreset, ScreenRenderer } from '@petal/core/ports';
import { contentPayload, errorPayload } from '@petal/core/ports';
import { ScreenId, presetScreen } from '@petal/core/domain';
import { buildBouquetButton, formatPrice, go } from './formatting.js';

export const renderHome: ScreenRenderer = async (_session, context) => {
  const name = context.profile?.firstName ?? 'there';
  return contentPayload(
    `👋 Hi, ${name}! 🌸\n\n` + 'Welcome to the world of flowers!\n' + 'Choose an action:',
    [
      [go('🤖 AI picks', ScreenId.AI_MENU)],
      [go('🌸 Catalog', ScreenId.CATALOG)],
      [buildBouquetButton()],
      [go('🛒 Cart', ScreenId.CART), go('📜 History', ScreenId.HISTORY)],
    ]
  );
};

export const renderAiMenu: ScreenRenderer = async (_session, context) => {
  const popular = await context.services.catalog.getPopular();
  const highlight = popular
    ? `⭐ Popular right now: ${popular.name} — ${formatPrice(popular.price)}\n${popular.description}`
    : 'No bouquets are available right now.';

  return contentPayload(`🤖 AI picks\n\n${highlight}`, [
    [go('💡 Ideas by occasion', ScreenId.RECOMMEND_PRESETS)],
    [go('📜 My last order', ScreenId.HISTORY)],
  ]);
};

export const renderRecommendPresets: ScreenRenderer = async (_session, context) => {
  const presets = await context.services.catalog.listPresets();
  if (presets.length === 0) {
    return contentPayload('💡 No ideas yet. Try building your own bouquet!', [[buildBouquetButton()]]);
  }

  return contentPayload(
    '💡 Pick an occasion:',
    presets.map((preset) => [go(preset.title, presetScreen(preset.id))])
  );
};

/**
 * Build the result screen for one preset. Registered per preset at startup.
 */
export function createPresetRenderer(presetId: RecommendationPreset['id']): ScreenRenderer {
  return async (_session, context) => {
    const preset = await context.services.catalog.getPreset(presetId);
    const flower = preset ? await context.services.catalog.getFlower(preset.flowerId) : null;

    if (!preset || !flower || !flower.available) {
      return errorPayload('❌ This recommendation is no longer available.', [
        [go('🌸 Catalog', ScreenId.CATALOG)],
      ]);
    }

    return contentPayload(
      `${preset.title}\n\n` +
        `${preset.note}\n\n` +
        `💐 We recommend: ${flower.name}\n` +
        `${flower.description}\n` +
        `Price: ${formatPrice(flower.price)}`,
      [[buildBouquetButton('🎨 Build my own instead')], [go('🌸 Catalog', ScreenId.CATALOG)]]
    );
  };
}
