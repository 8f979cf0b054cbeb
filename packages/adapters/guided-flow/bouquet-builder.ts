/**
 * BouquetBuilder
 *
 * Drives the guided bouquet flow stored on a navigation session:
 * COLOR → QUANTITY → ADDONS → SUMMARY
 *
 * Features:
 * - At most one flow per session
 * - Step input validated against fixed option tables
 * - Internal back that discards the revisited step's value
 * - Deterministic pricing on finalize
 *
 * The builder never reads or writes the navigation stack. Failures are
 * returned as results, never thrown, so the caller can re-prompt the user.
 */

import type { Logger } from 'pino';
import type {
  BouquetFlowState,
  BouquetOrder,
  GuidedFlowError,
  NavigationSession,
  StepInput,
} from '@petal/core/domain';
import {
  BouquetStep,
  DEFAULT_BOUQUET_BASE_PRICE,
  GuidedFlowIncompleteError,
  InvalidStepInputError,
  NoActiveGuidedFlowError,
  createBouquetFlow,
  getNextStep,
  getPreviousStep,
  isAddonId,
  toBouquetOrder,
  validateStepInput,
  withoutStepField,
} from '@petal/core/domain';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a builder operation.
 */
export type GuidedFlowResult<T> =
  | { success: true; value: T }
  | { success: false; error: GuidedFlowError };

export interface BouquetBuilderOptions {
  logger: Logger;
  /** Price before add-on surcharges (default: 2000) */
  basePrice?: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class BouquetBuilder {
  private readonly log: Logger;
  readonly basePrice: number;

  constructor(options: BouquetBuilderOptions) {
    this.log = options.logger.child({ component: 'BouquetBuilder' });
    this.basePrice = options.basePrice ?? DEFAULT_BOUQUET_BASE_PRICE;
  }

  /**
   * Begin a flow at COLOR. If one is already active it is returned unchanged.
   */
  start(session: NavigationSession): BouquetFlowState {
    if (session.guidedFlow) {
      this.log.debug(
        { userId: session.userId, step: session.guidedFlow.step },
        'Bouquet flow already active'
      );
      return session.guidedFlow;
    }

    const flow = createBouquetFlow();
    session.guidedFlow = flow;
    this.log.info({ userId: session.userId }, 'Bouquet flow started');
    return flow;
  }

  /**
   * Submit a value for the current step and move forward.
   * Invalid input leaves step and fields untouched.
   */
  advance(session: NavigationSession, input: StepInput): GuidedFlowResult<BouquetFlowState> {
    const flow = session.guidedFlow;
    if (!flow) {
      return this.noActiveFlow(session, 'advance');
    }

    const validation = validateStepInput(flow.step, input);
    if (!validation.valid) {
      this.log.debug(
        { userId: session.userId, step: flow.step, reason: validation.reason },
        'Rejected bouquet step input'
      );
      return { success: false, error: new InvalidStepInputError(flow.step, input, validation.reason) };
    }

    const from = flow.step;
    const next = getNextStep(from);
    if (!next) {
      // validateStepInput rejects everything at the terminal step
      return { success: false, error: new InvalidStepInputError(from, input, 'No further step') };
    }

    flow.fields = { ...flow.fields, ...validation.fields };
    flow.step = next;
    flow.addonDraft = [];

    this.log.debug({ userId: session.userId, from, to: next }, 'Bouquet step advanced');
    return { success: true, value: flow };
  }

  /**
   * Tick or untick an add-on at the ADDONS step without submitting.
   */
  toggleAddon(session: NavigationSession, addon: string): GuidedFlowResult<BouquetFlowState> {
    const flow = session.guidedFlow;
    if (!flow) {
      return this.noActiveFlow(session, 'toggleAddon');
    }

    if (flow.step !== BouquetStep.ADDONS) {
      return {
        success: false,
        error: new InvalidStepInputError(flow.step, addon, 'Add-ons are chosen at the ADDONS step'),
      };
    }
    if (!isAddonId(addon)) {
      return {
        success: false,
        error: new InvalidStepInputError(flow.step, addon, `Unknown add-on '${addon}'`),
      };
    }

    flow.addonDraft = flow.addonDraft.includes(addon)
      ? flow.addonDraft.filter((selected) => selected !== addon)
      : [...flow.addonDraft, addon];

    return { success: true, value: flow };
  }

  /**
   * Go to the previous step, discarding its stored value. No-op at COLOR.
   */
  stepBack(session: NavigationSession): GuidedFlowResult<BouquetFlowState> {
    const flow = session.guidedFlow;
    if (!flow) {
      return this.noActiveFlow(session, 'stepBack');
    }

    const previous = getPreviousStep(flow.step);
    if (!previous) {
      return { success: true, value: flow };
    }

    const from = flow.step;
    flow.fields = withoutStepField(flow.fields, previous);
    flow.step = previous;
    flow.addonDraft = [];

    this.log.debug({ userId: session.userId, from, to: previous }, 'Bouquet step back');
    return { success: true, value: flow };
  }

  /**
   * Preview the finished bouquet without ending the flow.
   */
  summarize(session: NavigationSession): GuidedFlowResult<BouquetOrder> {
    const flow = session.guidedFlow;
    if (!flow) {
      return this.noActiveFlow(session, 'summarize');
    }
    return this.toOrder(flow);
  }

  /**
   * Complete the flow. Only valid at SUMMARY; clears the flow on success.
   */
  finalize(session: NavigationSession): GuidedFlowResult<BouquetOrder> {
    const flow = session.guidedFlow;
    if (!flow) {
      return this.noActiveFlow(session, 'finalize');
    }

    const result = this.toOrder(flow);
    if (result.success) {
      session.guidedFlow = null;
      this.log.info(
        {
          userId: session.userId,
          color: result.value.color,
          quantity: result.value.quantity,
          addons: result.value.addons,
          price: result.value.price,
        },
        'Bouquet flow finalized'
      );
    }
    return result;
  }

  /**
   * Discard the flow without finalizing.
   *
   * @returns True if a flow was active
   */
  abandon(session: NavigationSession): boolean {
    if (!session.guidedFlow) {
      return false;
    }
    const step = session.guidedFlow.step;
    session.guidedFlow = null;
    this.log.info({ userId: session.userId, step }, 'Bouquet flow abandoned');
    return true;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private toOrder(flow: BouquetFlowState): GuidedFlowResult<BouquetOrder> {
    if (flow.step !== BouquetStep.SUMMARY) {
      return { success: false, error: new GuidedFlowIncompleteError(flow.step) };
    }
    const order = toBouquetOrder(flow.fields, this.basePrice);
    if (!order) {
      return { success: false, error: new GuidedFlowIncompleteError(flow.step) };
    }
    return { success: true, value: order };
  }

  private noActiveFlow<T>(session: NavigationSession, operation: string): GuidedFlowResult<T> {
    this.log.warn({ userId: session.userId, operation }, 'No active bouquet flow');
    return { success: false, error: new NoActiveGuidedFlowError(operation) };
  }
}
