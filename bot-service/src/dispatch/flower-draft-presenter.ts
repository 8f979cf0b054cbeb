/**
 * Flower Draft Presenter
 *
 * Prompts for the admin "add flower" flow. Answers are typed, so step
 * screens only carry the draft's own back and cancel buttons.
 */

import type { FlowerDraftFields, FlowerDraftState } from '@petal/core/domain';
import {
  FLOWER_CATEGORY_SUGGESTIONS,
  FLOWER_DRAFT_INPUT_STEPS,
  FlowerDraftStep,
  getDraftStepNumber,
} from '@petal/core/domain';
import type { ActionButton, PayloadButton, RenderedScreen } from '@petal/core/ports';
import { contentPayload, errorPayload } from '@petal/core/ports';
import { addFlowerButton, formatPrice } from '../screens/formatting.js';
import { BACK_BUTTON } from './buttons.js';

export const DRAFT_BACK_BUTTON: ActionButton = { label: '◀️ Back', action: { type: 'flower_draft_back' } };
export const DRAFT_CANCEL_BUTTON: ActionButton = { label: '❌ Cancel', action: { type: 'flower_draft_cancel' } };
export const DRAFT_SAVE_BUTTON: ActionButton = { label: '💾 Save', action: { type: 'flower_draft_save' } };

export function flowerDraftScreenId(step: FlowerDraftStep): string {
  return `flower_draft:${step.toLowerCase()}`;
}

const PROMPTS: Record<Exclude<FlowerDraftStep, FlowerDraftStep.REVIEW>, string> = {
  [FlowerDraftStep.NAME]: 'Send the flower name:',
  [FlowerDraftStep.DESCRIPTION]: 'Send a description:',
  [FlowerDraftStep.PRICE]: 'Send the price in ₽:',
  [FlowerDraftStep.CATEGORY]: `Send the category (${FLOWER_CATEGORY_SUGGESTIONS.join(', ')} or your own):`,
};

function describeFields(fields: FlowerDraftFields): string[] {
  const lines: string[] = [];
  if (fields.name !== undefined) lines.push(`Name: ${fields.name}`);
  if (fields.description !== undefined) lines.push(`Description: ${fields.description}`);
  if (fields.price !== undefined) lines.push(`Price: ${formatPrice(fields.price)}`);
  if (fields.category !== undefined) lines.push(`Category: ${fields.category}`);
  return lines;
}

/**
 * Render the prompt for the draft's current step.
 */
export function presentFlowerDraftStep(draft: Readonly<FlowerDraftState>, notice?: string): RenderedScreen {
  const prefix = notice ? `⚠️ ${notice}\n\n` : '';
  const entered = describeFields(draft.fields);

  if (draft.step === FlowerDraftStep.REVIEW) {
    return {
      screenId: flowerDraftScreenId(draft.step),
      payload: contentPayload(`${prefix}🌸 New flower:\n\n${entered.join('\n')}\n\nSave it to the catalog?`, [
        [DRAFT_SAVE_BUTTON],
        [DRAFT_BACK_BUTTON, DRAFT_CANCEL_BUTTON],
      ]),
    };
  }

  const controls: PayloadButton[] =
    draft.step === FlowerDraftStep.NAME ? [DRAFT_CANCEL_BUTTON] : [DRAFT_BACK_BUTTON, DRAFT_CANCEL_BUTTON];
  const sofar = entered.length > 0 ? `${entered.join('\n')}\n\n` : '';

  return {
    screenId: flowerDraftScreenId(draft.step),
    payload: contentPayload(
      `${prefix}➕ New flower\n\n${sofar}Step ${getDraftStepNumber(draft.step)}/${FLOWER_DRAFT_INPUT_STEPS}: ${PROMPTS[draft.step]}`,
      [controls]
    ),
  };
}

/**
 * Shown when a draft action arrives with no draft in progress.
 */
export function presentNoActiveDraft(): RenderedScreen {
  return {
    screenId: 'flower_draft:none',
    payload: errorPayload('🌸 No flower is being added. Start again?', [[addFlowerButton()], [BACK_BUTTON]]),
  };
}

/**
 * Shown when the catalog refused the entry. The draft stays at REVIEW.
 */
export function presentFlowerSaveFailure(): RenderedScreen {
  return {
    screenId: flowerDraftScreenId(FlowerDraftStep.REVIEW),
    payload: errorPayload('❌ Could not save the flower. Please try again.', [
      [{ label: '🔄 Try again', action: { type: 'flower_draft_save' } }],
      [DRAFT_BACK_BUTTON, DRAFT_CANCEL_BUTTON],
    ]),
  };
}
