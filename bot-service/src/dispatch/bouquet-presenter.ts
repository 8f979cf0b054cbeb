/**
 * Bouquet Presenter
 *
 * Turns bouquet builder state into display payloads. Step screens carry the
 * flow's own back button (guided_back) instead of the navigation back.
 */

import type { BouquetFlowState } from '@petal/core/domain';
import {
  ADDON_OPTIONS,
  BOUQUET_INPUT_STEPS,
  BouquetStep,
  COLOR_OPTIONS,
  QUANTITY_OPTIONS,
  computeBouquetPrice,
  getStepNumber,
} from '@petal/core/domain';
import type { ActionButton, PayloadButton, RenderedScreen } from '@petal/core/ports';
import { contentPayload, errorPayload } from '@petal/core/ports';
import {
  addonsLabel,
  buildBouquetButton,
  colorLabel,
  formatPrice,
  quantityLabel,
} from '../screens/formatting.js';
import { BACK_BUTTON, MAIN_MENU_BUTTON } from './buttons.js';

export const FLOW_BACK_BUTTON: ActionButton = { label: '◀️ Back', action: { type: 'guided_back' } };
export const CANCEL_BUTTON: ActionButton = { label: '❌ Cancel', action: { type: 'nav_reset' } };

export function bouquetScreenId(step: BouquetStep): string {
  return `bouquet:${step.toLowerCase()}`;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
}

function stepHeading(step: BouquetStep): string {
  return `Step ${getStepNumber(step)}/${BOUQUET_INPUT_STEPS}`;
}

/**
 * Render the prompt for the flow's current step.
 *
 * @param notice - Shown above the prompt, e.g. why the last input was rejected
 */
export function presentBouquetStep(
  flow: Readonly<BouquetFlowState>,
  basePrice: number,
  notice?: string
): RenderedScreen {
  const prefix = notice ? `⚠️ ${notice}\n\n` : '';
  const { fields } = flow;

  switch (flow.step) {
    case BouquetStep.COLOR: {
      const buttons: PayloadButton[][] = chunk(
        COLOR_OPTIONS.map(
          (option): ActionButton => ({
            label: option.label,
            action: { type: 'guided_advance', value: option.id },
          })
        ),
        2
      );
      buttons.push([CANCEL_BUTTON]);
      return {
        screenId: bouquetScreenId(flow.step),
        payload: contentPayload(
          `${prefix}🎨 Build your bouquet\n\n${stepHeading(flow.step)}: Choose the main colour:`,
          buttons
        ),
      };
    }

    case BouquetStep.QUANTITY: {
      const buttons: PayloadButton[][] = chunk(
        QUANTITY_OPTIONS.map(
          (option): ActionButton => ({
            label: option.label,
            action: { type: 'guided_advance', value: option.id },
          })
        ),
        3
      );
      buttons.push([FLOW_BACK_BUTTON, CANCEL_BUTTON]);
      const chosen = fields.color ? `✅ Colour: ${colorLabel(fields.color)}\n\n` : '';
      return {
        screenId: bouquetScreenId(flow.step),
        payload: contentPayload(
          `${prefix}${chosen}${stepHeading(flow.step)}: How many stems?`,
          buttons
        ),
      };
    }

    case BouquetStep.ADDONS: {
      const buttons: PayloadButton[][] = ADDON_OPTIONS.map((option): PayloadButton[] => [
        {
          label: `${flow.addonDraft.includes(option.id) ? '✓ ' : ''}${option.label} +${formatPrice(option.surcharge)}`,
          action: { type: 'guided_toggle', value: option.id },
        },
      ]);
      buttons.push([
        FLOW_BACK_BUTTON,
        { label: '✅ Done', action: { type: 'guided_advance', value: [...flow.addonDraft] } },
      ]);
      const chosen = fields.quantity ? `✅ Stems: ${fields.quantity}\n\n` : '';
      return {
        screenId: bouquetScreenId(flow.step),
        payload: contentPayload(
          `${prefix}${chosen}${stepHeading(flow.step)}: Pick add-ons, then press Done.\n` +
            `Current price: ${formatPrice(computeBouquetPrice(flow.addonDraft, basePrice))}`,
          buttons
        ),
      };
    }

    case BouquetStep.SUMMARY: {
      const addons = fields.addons ?? [];
      return {
        screenId: bouquetScreenId(flow.step),
        payload: contentPayload(
          `${prefix}🌸 Your bouquet:\n\n` +
            `🎨 Colour: ${fields.color ? colorLabel(fields.color) : 'not chosen'}\n` +
            `📊 Stems: ${fields.quantity ? quantityLabel(fields.quantity) : 'not chosen'}\n` +
            `✨ Add-ons: ${addonsLabel(addons)}\n\n` +
            `💰 Price: ${formatPrice(computeBouquetPrice(addons, basePrice))}`,
          [
            [{ label: '🛒 Add to cart', action: { type: 'guided_finalize' } }],
            [FLOW_BACK_BUTTON, CANCEL_BUTTON],
          ]
        ),
      };
    }
  }
}

/**
 * Shown when a builder action arrives with no flow in progress.
 */
export function presentNoActiveFlow(): RenderedScreen {
  return {
    screenId: 'bouquet:none',
    payload: errorPayload('🌸 There is no bouquet in progress. Start a new one?', [
      [buildBouquetButton()],
      [MAIN_MENU_BUTTON],
      [BACK_BUTTON],
    ]),
  };
}

/**
 * Shown when the finished bouquet could not be put into the cart.
 * The flow stays at SUMMARY so the user can retry.
 */
export function presentCartFailure(): RenderedScreen {
  return {
    screenId: bouquetScreenId(BouquetStep.SUMMARY),
    payload: errorPayload('❌ Could not add the bouquet to your cart. Please try again.', [
      [{ label: '🔄 Try again', action: { type: 'guided_finalize' } }],
      [FLOW_BACK_BUTTON, CANCEL_BUTTON],
    ]),
  };
}
