/**
 * FlowerDraftBuilder Tests
 *
 * Covers:
 * - Typed answers walked through to a new catalog entry
 * - Re-prompting on a price that is not a number
 * - Internal back discarding the revisited value
 * - Finalize and abandon
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from 'pino';
import type { NavigationSession } from '@petal/core/domain';
import {
  FlowerDraftStep,
  GuidedFlowIncompleteError,
  InvalidStepInputError,
  NoActiveGuidedFlowError,
  ScreenId,
  createSession,
} from '@petal/core/domain';
import { FlowerDraftBuilder } from '../flower-draft-builder.js';

function createMockLogger(): Logger {
  return {
    child: vi.fn().mockReturnThis(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Logger;
}

describe('FlowerDraftBuilder', () => {
  let logger: Logger;
  let builder: FlowerDraftBuilder;
  let session: NavigationSession;

  beforeEach(() => {
    logger = createMockLogger();
    builder = new FlowerDraftBuilder({ logger });
    session = createSession(900);
  });

  function fillDraft(): void {
    builder.start(session);
    builder.advance(session, ' Peonies ');
    builder.advance(session, 'Seven pink peonies');
    builder.advance(session, '3200,50');
    builder.advance(session, 'Peonies');
  }

  describe('start', () => {
    it('begins at NAME and resumes an active draft', () => {
      const draft = builder.start(session);

      expect(draft.step).toBe(FlowerDraftStep.NAME);
      expect(draft.fields).toEqual({});
      expect(builder.start(session)).toBe(draft);
    });
  });

  describe('advance', () => {
    it('collects every answer and stops at REVIEW', () => {
      fillDraft();

      expect(session.flowerDraft?.step).toBe(FlowerDraftStep.REVIEW);
      expect(session.flowerDraft?.fields).toEqual({
        name: 'Peonies',
        description: 'Seven pink peonies',
        price: 3200.5,
        category: 'peonies',
      });
    });

    it('re-prompts the price step on a non-number', () => {
      builder.start(session);
      builder.advance(session, 'Tulips');
      builder.advance(session, 'Nine tulips');

      const result = builder.advance(session, 'cheap');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidStepInputError);
        if (result.error instanceof InvalidStepInputError) {
          expect(result.error.step).toBe(FlowerDraftStep.PRICE);
          expect(result.error.reason).toBe('Invalid price. Send a number, e.g. 1500');
        }
      }
      expect(session.flowerDraft?.step).toBe(FlowerDraftStep.PRICE);
      expect(session.flowerDraft?.fields).toEqual({ name: 'Tulips', description: 'Nine tulips' });
    });

    it('rejects input at REVIEW', () => {
      fillDraft();

      const result = builder.advance(session, 'more');

      expect(result.success).toBe(false);
      expect(session.flowerDraft?.step).toBe(FlowerDraftStep.REVIEW);
    });

    it('reports a missing draft', () => {
      const result = builder.advance(session, 'Roses');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(NoActiveGuidedFlowError);
        expect(result.error.message).toBe("No active flower draft flow for 'advance'");
      }
    });

    it('never touches navigation', () => {
      session.currentScreen = ScreenId.ADMIN_MAIN;

      fillDraft();

      expect(session.currentScreen).toBe(ScreenId.ADMIN_MAIN);
      expect(session.navStack).toEqual([]);
      expect(session.guidedFlow).toBeNull();
    });
  });

  describe('stepBack', () => {
    it('discards the value of the step returned to', () => {
      builder.start(session);
      builder.advance(session, 'Roses');
      builder.advance(session, 'Red roses');

      builder.stepBack(session);
      builder.advance(session, 'White roses');

      expect(session.flowerDraft?.step).toBe(FlowerDraftStep.PRICE);
      expect(session.flowerDraft?.fields).toEqual({ name: 'Roses', description: 'White roses' });
    });

    it('is a no-op at NAME', () => {
      const draft = builder.start(session);

      expect(builder.stepBack(session)).toEqual({ success: true, value: draft });
      expect(draft.step).toBe(FlowerDraftStep.NAME);
    });
  });

  describe('finalize', () => {
    it('returns the new entry and clears the draft', () => {
      fillDraft();

      const preview = builder.summarize(session);
      const result = builder.finalize(session);

      expect(preview).toEqual(result);
      expect(result).toEqual({
        success: true,
        value: { name: 'Peonies', description: 'Seven pink peonies', price: 3200.5, category: 'peonies' },
      });
      expect(session.flowerDraft).toBeNull();
    });

    it('fails before REVIEW and keeps the draft', () => {
      builder.start(session);
      builder.advance(session, 'Roses');

      const result = builder.finalize(session);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(GuidedFlowIncompleteError);
      }
      expect(session.flowerDraft?.step).toBe(FlowerDraftStep.DESCRIPTION);
    });
  });

  describe('abandon', () => {
    it('drops the draft and logs it', () => {
      builder.start(session);
      builder.advance(session, 'Roses');

      expect(builder.abandon(session)).toBe(true);
      expect(session.flowerDraft).toBeNull();
      expect(logger.info).toHaveBeenCalledWith(
        { userId: '900', step: FlowerDraftStep.DESCRIPTION },
        'Flower draft abandoned'
      );
      expect(builder.abandon(session)).toBe(false);
    });
  });
});
