/**
 * Flower Draft Domain Types
 *
 * Admin flow for adding a catalog entry, answered with typed text:
 * NAME → DESCRIPTION → PRICE → CATEGORY → REVIEW
 *
 * Same rules as the bouquet builder: one validated field per step, and
 * stepping back discards the field of the step returned to.
 */

// =============================================================================
// Step Machine
// =============================================================================

export enum FlowerDraftStep {
  NAME = 'NAME',
  DESCRIPTION = 'DESCRIPTION',
  PRICE = 'PRICE',
  CATEGORY = 'CATEGORY',
  /** Terminal pseudo-step, awaiting save */
  REVIEW = 'REVIEW',
}

export const FLOWER_DRAFT_STEP_ORDER: readonly FlowerDraftStep[] = [
  FlowerDraftStep.NAME,
  FlowerDraftStep.DESCRIPTION,
  FlowerDraftStep.PRICE,
  FlowerDraftStep.CATEGORY,
  FlowerDraftStep.REVIEW,
];

export const FLOWER_DRAFT_INPUT_STEPS = FLOWER_DRAFT_STEP_ORDER.length - 1;

export function getNextDraftStep(step: FlowerDraftStep): FlowerDraftStep | null {
  const index = FLOWER_DRAFT_STEP_ORDER.indexOf(step);
  return FLOWER_DRAFT_STEP_ORDER[index + 1] ?? null;
}

export function getPreviousDraftStep(step: FlowerDraftStep): FlowerDraftStep | null {
  const index = FLOWER_DRAFT_STEP_ORDER.indexOf(step);
  return index > 0 ? FLOWER_DRAFT_STEP_ORDER[index - 1] ?? null : null;
}

export function getDraftStepNumber(step: FlowerDraftStep): number {
  return FLOWER_DRAFT_STEP_ORDER.indexOf(step) + 1;
}

// =============================================================================
// Limits
// =============================================================================

export const FLOWER_NAME_MAX_LENGTH = 64;
export const FLOWER_DESCRIPTION_MAX_LENGTH = 500;
export const FLOWER_CATEGORY_MAX_LENGTH = 32;

/** Offered in the category prompt; any other category is accepted too */
export const FLOWER_CATEGORY_SUGGESTIONS: readonly string[] = ['roses', 'tulips', 'peonies', 'mixed'];

// =============================================================================
// Flow State
// =============================================================================

export interface FlowerDraftFields {
  name?: string;
  description?: string;
  price?: number;
  category?: string;
}

export interface FlowerDraftState {
  step: FlowerDraftStep;
  fields: FlowerDraftFields;
  startedAt: Date;
}

/**
 * Catalog entry assembled from a finished draft.
 */
export interface NewFlower {
  name: string;
  description: string;
  price: number;
  category: string;
}

export function createFlowerDraft(now: Date = new Date()): FlowerDraftState {
  return {
    step: FlowerDraftStep.NAME,
    fields: {},
    startedAt: now,
  };
}

// =============================================================================
// Validation
// =============================================================================

export type DraftValidationResult =
  | { valid: true; fields: FlowerDraftFields }
  | { valid: false; reason: string };

const PRICE_PATTERN = /^\d+(\.\d{1,2})?$/;

/**
 * Parse a typed price. Accepts "1500", "1500.50" and "1500,50".
 */
export function parsePrice(text: string): number | null {
  const normalized = text.trim().replace(',', '.');
  if (!PRICE_PATTERN.test(normalized)) {
    return null;
  }
  const price = Number(normalized);
  return price > 0 ? price : null;
}

function requireText(text: string, label: string, maxLength: number): DraftValidationResult | string {
  const trimmed = text.trim();
  if (!trimmed) {
    return { valid: false, reason: `${label} cannot be empty` };
  }
  if (trimmed.length > maxLength) {
    return { valid: false, reason: `${label} must be at most ${maxLength} characters` };
  }
  return trimmed;
}

/**
 * Validate typed text for a step and return the field it contributes.
 */
export function validateDraftInput(step: FlowerDraftStep, text: string): DraftValidationResult {
  switch (step) {
    case FlowerDraftStep.NAME: {
      const name = requireText(text, 'Name', FLOWER_NAME_MAX_LENGTH);
      return typeof name === 'string' ? { valid: true, fields: { name } } : name;
    }

    case FlowerDraftStep.DESCRIPTION: {
      const description = requireText(text, 'Description', FLOWER_DESCRIPTION_MAX_LENGTH);
      return typeof description === 'string' ? { valid: true, fields: { description } } : description;
    }

    case FlowerDraftStep.PRICE: {
      const price = parsePrice(text);
      if (price === null) {
        return { valid: false, reason: 'Invalid price. Send a number, e.g. 1500' };
      }
      return { valid: true, fields: { price } };
    }

    case FlowerDraftStep.CATEGORY: {
      const category = requireText(text, 'Category', FLOWER_CATEGORY_MAX_LENGTH);
      return typeof category === 'string'
        ? { valid: true, fields: { category: category.toLowerCase() } }
        : category;
    }

    case FlowerDraftStep.REVIEW:
      return { valid: false, reason: 'All details are entered, press Save' };
  }
}

export function withoutDraftField(fields: FlowerDraftFields, step: FlowerDraftStep): FlowerDraftFields {
  const next: FlowerDraftFields = { ...fields };
  switch (step) {
    case FlowerDraftStep.NAME:
      delete next.name;
      break;
    case FlowerDraftStep.DESCRIPTION:
      delete next.description;
      break;
    case FlowerDraftStep.PRICE:
      delete next.price;
      break;
    case FlowerDraftStep.CATEGORY:
      delete next.category;
      break;
    case FlowerDraftStep.REVIEW:
      break;
  }
  return next;
}

/**
 * Assemble the catalog entry, or null if a field is missing.
 */
export function toNewFlower(fields: FlowerDraftFields): NewFlower | null {
  const { name, description, price, category } = fields;
  if (name === undefined || description === undefined || price === undefined || category === undefined) {
    return null;
  }
  return { name, description, price, category };
}
