/**
 * FlowerDraftBuilder
 *
 * Drives the admin "add flower" flow stored on a navigation session:
 * NAME → DESCRIPTION → PRICE → CATEGORY → REVIEW
 *
 * Answers arrive as typed text. Like the bouquet builder it never touches the
 * navigation stack and reports failures as results.
 */

import type { Logger } from 'pino';
import type { FlowerDraftState, NavigationSession, NewFlower } from '@petal/core/domain';
import {
  FlowerDraftStep,
  GuidedFlowIncompleteError,
  InvalidStepInputError,
  NoActiveGuidedFlowError,
  createFlowerDraft,
  getNextDraftStep,
  getPreviousDraftStep,
  toNewFlower,
  validateDraftInput,
  withoutDraftField,
} from '@petal/core/domain';
import type { GuidedFlowResult } from './bouquet-builder.js';

export interface FlowerDraftBuilderOptions {
  logger: Logger;
}

export class FlowerDraftBuilder {
  private readonly log: Logger;

  constructor(options: FlowerDraftBuilderOptions) {
    this.log = options.logger.child({ component: 'FlowerDraftBuilder' });
  }

  /**
   * Begin a draft at NAME, or return the one in progress.
   */
  start(session: NavigationSession): FlowerDraftState {
    if (session.flowerDraft) {
      return session.flowerDraft;
    }

    const draft = createFlowerDraft();
    session.flowerDraft = draft;
    this.log.info({ userId: session.userId }, 'Flower draft started');
    return draft;
  }

  /**
   * Submit typed text for the current step. Invalid text leaves the draft as it was.
   */
  advance(session: NavigationSession, text: string): GuidedFlowResult<FlowerDraftState> {
    const draft = session.flowerDraft;
    if (!draft) {
      return this.noActiveDraft(session, 'advance');
    }

    const validation = validateDraftInput(draft.step, text);
    if (!validation.valid) {
      this.log.debug(
        { userId: session.userId, step: draft.step, reason: validation.reason },
        'Rejected flower draft input'
      );
      return { success: false, error: new InvalidStepInputError(draft.step, text, validation.reason) };
    }

    const from = draft.step;
    const next = getNextDraftStep(from);
    if (!next) {
      return { success: false, error: new InvalidStepInputError(from, text, 'No further step') };
    }

    draft.fields = { ...draft.fields, ...validation.fields };
    draft.step = next;

    this.log.debug({ userId: session.userId, from, to: next }, 'Flower draft advanced');
    return { success: true, value: draft };
  }

  /**
   * Go to the previous step, discarding its value. No-op at NAME.
   */
  stepBack(session: NavigationSession): GuidedFlowResult<FlowerDraftState> {
    const draft = session.flowerDraft;
    if (!draft) {
      return this.noActiveDraft(session, 'stepBack');
    }

    const previous = getPreviousDraftStep(draft.step);
    if (!previous) {
      return { success: true, value: draft };
    }

    draft.fields = withoutDraftField(draft.fields, previous);
    draft.step = previous;
    return { success: true, value: draft };
  }

  /**
   * The entry a save would store, without ending the draft.
   */
  summarize(session: NavigationSession): GuidedFlowResult<NewFlower> {
    const draft = session.flowerDraft;
    if (!draft) {
      return this.noActiveDraft(session, 'summarize');
    }
    return this.toFlower(draft);
  }

  /**
   * End the draft. Only valid at REVIEW.
   */
  finalize(session: NavigationSession): GuidedFlowResult<NewFlower> {
    const draft = session.flowerDraft;
    if (!draft) {
      return this.noActiveDraft(session, 'finalize');
    }

    const result = this.toFlower(draft);
    if (result.success) {
      session.flowerDraft = null;
      this.log.info({ userId: session.userId, name: result.value.name }, 'Flower draft finalized');
    }
    return result;
  }

  /**
   * @returns True if a draft was active
   */
  abandon(session: NavigationSession): boolean {
    if (!session.flowerDraft) {
      return false;
    }
    const step = session.flowerDraft.step;
    session.flowerDraft = null;
    this.log.info({ userId: session.userId, step }, 'Flower draft abandoned');
    return true;
  }

  private toFlower(draft: FlowerDraftState): GuidedFlowResult<NewFlower> {
    const flower = draft.step === FlowerDraftStep.REVIEW ? toNewFlower(draft.fields) : null;
    if (!flower) {
      return { success: false, error: new GuidedFlowIncompleteError(draft.step) };
    }
    return { success: true, value: flower };
  }

  private noActiveDraft<T>(session: NavigationSession, operation: string): GuidedFlowResult<T> {
    this.log.warn({ userId: session.userId, operation }, 'No active flower draft');
    return { success: false, error: new NoActiveGuidedFlowError(operation, 'flower draft') };
  }
}
