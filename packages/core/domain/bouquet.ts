/**
 * Bouquet Builder Domain Types
 *
 * Defines the linear guided flow used to assemble a custom bouquet:
 * COLOR → QUANTITY → ADDONS → SUMMARY
 *
 * Each forward step stores one validated field. Stepping back discards the
 * field of the step being returned to, so re-entering a step always starts
 * from an unset value.
 */

import type { FlowerDraftStep } from './flower-draft.js';

// =============================================================================
// Step Machine
// =============================================================================

export enum BouquetStep {
  /** Pick the dominant colour */
  COLOR = 'COLOR',
  /** Pick the stem count */
  QUANTITY = 'QUANTITY',
  /** Multi-select extras (may be empty) */
  ADDONS = 'ADDONS',
  /** Terminal pseudo-step, awaiting finalize */
  SUMMARY = 'SUMMARY',
}

/**
 * Step order. Forward is index + 1, back is index - 1.
 */
export const BOUQUET_STEP_ORDER: readonly BouquetStep[] = [
  BouquetStep.COLOR,
  BouquetStep.QUANTITY,
  BouquetStep.ADDONS,
  BouquetStep.SUMMARY,
];

/**
 * Number of input steps shown to the user ("Step 2/3").
 */
export const BOUQUET_INPUT_STEPS = BOUQUET_STEP_ORDER.length - 1;

export function getNextStep(step: BouquetStep): BouquetStep | null {
  const index = BOUQUET_STEP_ORDER.indexOf(step);
  return BOUQUET_STEP_ORDER[index + 1] ?? null;
}

export function getPreviousStep(step: BouquetStep): BouquetStep | null {
  const index = BOUQUET_STEP_ORDER.indexOf(step);
  return index > 0 ? BOUQUET_STEP_ORDER[index - 1] ?? null : null;
}

export function isTerminalStep(step: BouquetStep): boolean {
  return step === BouquetStep.SUMMARY;
}

/**
 * Get the step number (1-based) for a step.
 */
export function getStepNumber(step: BouquetStep): number {
  return BOUQUET_STEP_ORDER.indexOf(step) + 1;
}

// =============================================================================
// Options
// =============================================================================

export type ColorId = 'red' | 'yellow' | 'blue' | 'purple' | 'green' | 'white' | 'orange' | 'mix';

export type QuantityOption = '5' | '7' | '11' | '15' | '21' | '25';

export type AddonId = 'ribbon' | 'luxury' | 'toy' | 'sweets';

export interface BouquetOption<T extends string> {
  id: T;
  /** Button label */
  label: string;
}

export interface AddonOption extends BouquetOption<AddonId> {
  /** Added to the base price when selected */
  surcharge: number;
}

export const COLOR_OPTIONS: readonly BouquetOption<ColorId>[] = [
  { id: 'red', label: '🔴 Red' },
  { id: 'yellow', label: '🟡 Yellow' },
  { id: 'blue', label: '🔵 Blue' },
  { id: 'purple', label: '🟣 Purple' },
  { id: 'green', label: '🟢 Green' },
  { id: 'white', label: '⚪ White' },
  { id: 'orange', label: '🟠 Orange' },
  { id: 'mix', label: '🟤 Mix' },
];

export const QUANTITY_OPTIONS: readonly BouquetOption<QuantityOption>[] = [
  { id: '5', label: '5 stems' },
  { id: '7', label: '7 stems' },
  { id: '11', label: '11 stems' },
  { id: '15', label: '15 stems' },
  { id: '21', label: '21 stems' },
  { id: '25', label: '25 stems' },
];

export const ADDON_OPTIONS: readonly AddonOption[] = [
  { id: 'ribbon', label: '🎀 Ribbon', surcharge: 100 },
  { id: 'luxury', label: '🎁 Luxury wrap', surcharge: 300 },
  { id: 'toy', label: '🧸 Soft toy', surcharge: 450 },
  { id: 'sweets', label: '🍫 Sweets', surcharge: 250 },
];

export const DEFAULT_BOUQUET_BASE_PRICE = 2000;

export function isColorId(value: string): value is ColorId {
  return COLOR_OPTIONS.some((option) => option.id === value);
}

export function isQuantityOption(value: string): value is QuantityOption {
  return QUANTITY_OPTIONS.some((option) => option.id === value);
}

export function isAddonId(value: string): value is AddonId {
  return ADDON_OPTIONS.some((option) => option.id === value);
}

// =============================================================================
// Flow State
// =============================================================================

/**
 * Accumulated step data. Each step populates its corresponding field.
 */
export interface BouquetFields {
  // COLOR step
  color?: ColorId;
  // QUANTITY step
  quantity?: QuantityOption;
  // ADDONS step
  addons?: AddonId[];
}

export interface BouquetFlowState {
  step: BouquetStep;
  fields: BouquetFields;
  /** Add-ons ticked so far at the ADDONS step, not yet submitted */
  addonDraft: AddonId[];
  startedAt: Date;
}

/**
 * Value submitted for a step: a single option id, or a list at ADDONS.
 */
export type StepInput = string | readonly string[];

/**
 * Finished bouquet returned by finalize.
 */
export interface BouquetOrder {
  color: ColorId;
  quantity: QuantityOption;
  addons: AddonId[];
  basePrice: number;
  price: number;
}

export function createBouquetFlow(now: Date = new Date()): BouquetFlowState {
  return {
    step: BouquetStep.COLOR,
    fields: {},
    addonDraft: [],
    startedAt: now,
  };
}

// =============================================================================
// Validation
// =============================================================================

export type StepValidationResult =
  | { valid: true; fields: BouquetFields }
  | { valid: false; reason: string };

/**
 * Validate input for a step and return the fields it contributes.
 * Does not touch the flow state.
 */
export function validateStepInput(step: BouquetStep, input: StepInput): StepValidationResult {
  switch (step) {
    case BouquetStep.COLOR:
      if (typeof input !== 'string' || !isColorId(input)) {
        return { valid: false, reason: 'Unknown colour' };
      }
      return { valid: true, fields: { color: input } };

    case BouquetStep.QUANTITY:
      if (typeof input !== 'string' || !isQuantityOption(input)) {
        return { valid: false, reason: 'Unsupported stem count' };
      }
      return { valid: true, fields: { quantity: input } };

    case BouquetStep.ADDONS: {
      if (typeof input === 'string') {
        return { valid: false, reason: 'Add-ons must be submitted as a list' };
      }
      const addons: AddonId[] = [];
      for (const value of input) {
        if (!isAddonId(value)) {
          return { valid: false, reason: `Unknown add-on '${value}'` };
        }
        if (addons.includes(value)) {
          return { valid: false, reason: `Add-on '${value}' selected twice` };
        }
        addons.push(value);
      }
      return { valid: true, fields: { addons } };
    }

    case BouquetStep.SUMMARY:
      return { valid: false, reason: 'Bouquet is complete, nothing more to choose' };
  }
}

/**
 * Drop the field owned by a step.
 */
export function withoutStepField(fields: BouquetFields, step: BouquetStep): BouquetFields {
  const next: BouquetFields = { ...fields };
  switch (step) {
    case BouquetStep.COLOR:
      delete next.color;
      break;
    case BouquetStep.QUANTITY:
      delete next.quantity;
      break;
    case BouquetStep.ADDONS:
      delete next.addons;
      break;
    case BouquetStep.SUMMARY:
      break;
  }
  return next;
}

// =============================================================================
// Pricing
// =============================================================================

/**
 * Price of a bouquet: base plus the surcharge of every selected add-on.
 * Independent of selection order.
 */
export function computeBouquetPrice(
  addons: readonly AddonId[],
  basePrice: number = DEFAULT_BOUQUET_BASE_PRICE
): number {
  return addons.reduce((total, addon) => total + getAddonSurcharge(addon), basePrice);
}

export function getAddonSurcharge(addon: AddonId): number {
  return ADDON_OPTIONS.find((option) => option.id === addon)?.surcharge ?? 0;
}

/**
 * Assemble the finished order from complete fields, or null if a field is missing.
 */
export function toBouquetOrder(
  fields: BouquetFields,
  basePrice: number = DEFAULT_BOUQUET_BASE_PRICE
): BouquetOrder | null {
  const { color, quantity, addons } = fields;
  if (!color || !quantity || !addons) {
    return null;
  }
  return {
    color,
    quantity,
    addons: [...addons],
    basePrice,
    price: computeBouquetPrice(addons, basePrice),
  };
}

// =============================================================================
// Errors
// =============================================================================

export type GuidedFlowErrorCode = 'invalid_step_input' | 'no_active_flow' | 'flow_incomplete';

/**
 * Step of either guided flow.
 */
export type GuidedStep = BouquetStep | FlowerDraftStep;

/**
 * Base class for recoverable guided flow failures.
 */
export abstract class GuidedFlowError extends Error {
  abstract readonly code: GuidedFlowErrorCode;
}

/**
 * Value outside the current step's accepted domain. The user is re-prompted.
 */
export class InvalidStepInputError extends GuidedFlowError {
  readonly code = 'invalid_step_input';
  readonly step: GuidedStep;
  readonly input: StepInput;
  /** User-facing explanation */
  readonly reason: string;

  constructor(step: GuidedStep, input: StepInput, reason: string) {
    super(`Invalid input for step ${step}: ${reason}`);
    this.name = 'InvalidStepInputError';
    this.step = step;
    this.input = input;
    this.reason = reason;
  }
}

/**
 * Builder operation received while no flow is active.
 */
export class NoActiveGuidedFlowError extends GuidedFlowError {
  readonly code = 'no_active_flow';

  constructor(operation: string, flow = 'bouquet') {
    super(`No active ${flow} flow for '${operation}'`);
    this.name = 'NoActiveGuidedFlowError';
  }
}

/**
 * Finalize (or preview) requested before the SUMMARY step.
 */
export class GuidedFlowIncompleteError extends GuidedFlowError {
  readonly code = 'flow_incomplete';
  readonly step: GuidedStep;

  constructor(step: GuidedStep) {
    super(`Guided flow is still at step ${step}`);
    this.name = 'GuidedFlowIncompleteError';
    this.step = step;
  }
}
