/**
 * NavigationDispatcher Tests
 *
 * Drives the dispatcher end to end over the real engine, builder, session
 * store and in-memory shop.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from 'pino';
import { BouquetStep, FlowerDraftStep, ScreenId, presetScreen } from '@petal/core/domain';
import type { InboundAction, RenderedScreen } from '@petal/core/ports';
import { BouquetBuilder, FlowerDraftBuilder } from '@petal/adapters/guided-flow';
import { NavigationEngine, RENDER_FAILURE_TEXT, ScreenRegistry } from '@petal/adapters/navigation';
import { InMemorySessionStore } from '@petal/adapters/session';
import type { InMemoryShop } from '@petal/adapters/shop';
import {
  ADMIN_DENIED_TEXT,
  BACK_BUTTON,
  CART_CLEARED_TEXT,
  MAIN_MENU_BUTTON,
  NavigationDispatcher,
  createAdminPolicy,
} from '../../src/dispatch/index.js';
import { registerAllScreens, registerPresetScreens } from '../../src/screens/index.js';
import { WEBAPP_URL, createMockLogger, createShop } from '../helpers.js';

// =============================================================================
// Test Helpers
// =============================================================================

const USER = 42;
const PROFILE = { id: USER, username: 'anna', firstName: 'Anna' };

interface Harness {
  dispatcher: NavigationDispatcher;
  builder: BouquetBuilder;
  sessions: InMemorySessionStore;
  shop: InMemoryShop;
  logger: Logger;
}

async function createHarness(adminIds: number[] = []): Promise<Harness> {
  const logger = createMockLogger();
  const shop = createShop();
  const registry = new ScreenRegistry(logger);
  registerAllScreens(registry);
  await registerPresetScreens(registry, shop);
  const sessions = new InMemorySessionStore({ logger });
  const builder = new BouquetBuilder({ logger });

  const dispatcher = new NavigationDispatcher({
    sessions,
    navigation: new NavigationEngine({ registry, logger }),
    builder,
    flowerDrafts: new FlowerDraftBuilder({ logger }),
    services: shop.asServices(),
    admins: createAdminPolicy(adminIds),
    webAppUrl: WEBAPP_URL,
    logger,
  });

  return { dispatcher, builder, sessions, shop, logger };
}

function lastRow(screen: RenderedScreen): unknown {
  return screen.payload.buttons[screen.payload.buttons.length - 1];
}

// =============================================================================
// Tests
// =============================================================================

describe('NavigationDispatcher', () => {
  let h: Harness;

  const send = (action: InboundAction, userId: number = USER): Promise<RenderedScreen> =>
    h.dispatcher.dispatch({ userId, action, profile: { ...PROFILE, id: userId } });

  beforeEach(async () => {
    h = await createHarness();
  });

  describe('screen navigation', () => {
    it('shows home on reset without a back button', async () => {
      const screen = await send({ type: 'nav_reset' });

      expect(screen.screenId).toBe(ScreenId.HOME);
      expect(screen.payload.text.startsWith('👋 Hi, Anna! 🌸')).toBe(true);
      expect(screen.payload.buttons.flat()).not.toContainEqual(BACK_BUTTON);
    });

    it('adds a back button to every other screen', async () => {
      const screen = await send({ type: 'enter_screen', target: ScreenId.CATALOG });

      expect(screen.screenId).toBe(ScreenId.CATALOG);
      expect(lastRow(screen)).toEqual([BACK_BUTTON]);
    });

    it('retraces nested screens with back', async () => {
      const preset = presetScreen('birthday');

      await send({ type: 'enter_screen', target: ScreenId.AI_MENU });
      const presetView = await send({ type: 'enter_screen', target: preset });
      expect(presetView.screenId).toBe(preset);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME, ScreenId.AI_MENU]);

      const first = await send({ type: 'nav_back' });
      expect(first.screenId).toBe(ScreenId.AI_MENU);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME]);

      const second = await send({ type: 'nav_back' });
      expect(second.screenId).toBe(ScreenId.HOME);
      expect(h.sessions.get(USER)?.navStack).toEqual([]);
    });

    it('records the user on reset', async () => {
      await send({ type: 'nav_reset' });

      const users = await h.shop.listRecentUsers(10);
      expect(users.map((user) => user.username)).toEqual(['anna']);
    });

    it('still resets when the user directory fails', async () => {
      vi.spyOn(h.shop, 'upsert').mockRejectedValue(new Error('directory offline'));

      const screen = await send({ type: 'nav_reset' });

      expect(screen.screenId).toBe(ScreenId.HOME);
      expect(h.logger.warn).toHaveBeenCalledWith(
        { userId: USER, error: 'directory offline' },
        'Failed to record user visit'
      );
    });

    it('turns a failing screen into an error payload that keeps the back button', async () => {
      vi.spyOn(h.shop, 'getItems').mockRejectedValue(new Error('cart offline'));

      const screen = await send({ type: 'enter_screen', target: ScreenId.CART });

      expect(screen.screenId).toBe(ScreenId.CART);
      expect(screen.payload).toEqual({
        kind: 'error',
        text: RENDER_FAILURE_TEXT,
        buttons: [[{ label: '🏠 Main menu', action: { type: 'nav_reset' } }], [BACK_BUTTON]],
      });
    });

    it('applies one user’s concurrent actions in arrival order', async () => {
      await Promise.all([
        send({ type: 'enter_screen', target: ScreenId.AI_MENU }),
        send({ type: 'enter_screen', target: ScreenId.RECOMMEND_PRESETS }),
        send({ type: 'nav_back' }),
      ]);

      expect(h.sessions.get(USER)?.currentScreen).toBe(ScreenId.AI_MENU);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME]);
    });
  });

  describe('admin access', () => {
    beforeEach(async () => {
      h = await createHarness([1]);
    });

    it('refuses non-admins and leaves the session untouched', async () => {
      await send({ type: 'enter_screen', target: ScreenId.CATALOG }, 2);

      const screen = await send({ type: 'admin_entry' }, 2);

      expect(screen.screenId).toBe(ScreenId.CATALOG);
      expect(screen.payload.kind).toBe('error');
      expect(screen.payload.text).toBe(ADMIN_DENIED_TEXT);
      expect(screen.payload.buttons).toEqual([[MAIN_MENU_BUTTON], [BACK_BUTTON]]);
      expect(h.sessions.get(2)?.currentScreen).toBe(ScreenId.CATALOG);
      expect(h.sessions.get(2)?.navStack).toEqual([ScreenId.HOME]);
    });

    it('refuses direct links to admin screens', async () => {
      const screen = await send({ type: 'enter_screen', target: ScreenId.ADMIN_ORDERS }, 2);

      expect(screen.payload.text).toBe(ADMIN_DENIED_TEXT);
      expect(h.sessions.get(2)?.currentScreen).toBe(ScreenId.HOME);
    });

    it('enters the admin area as a new root', async () => {
      await send({ type: 'enter_screen', target: ScreenId.CATALOG }, 1);

      const screen = await send({ type: 'admin_entry' }, 1);

      expect(screen.screenId).toBe(ScreenId.ADMIN_MAIN);
      expect(h.sessions.get(1)?.navStack).toEqual([]);

      const back = await send({ type: 'nav_back' }, 1);
      expect(back.screenId).toBe(ScreenId.HOME);
    });

    it('lets everyone in when no admins are configured', async () => {
      h = await createHarness([]);

      const screen = await send({ type: 'admin_entry' }, 2);

      expect(screen.screenId).toBe(ScreenId.ADMIN_MAIN);
    });
  });

  describe('bouquet builder', () => {
    async function buildToSummary(): Promise<RenderedScreen> {
      await send({ type: 'guided_start' });
      await send({ type: 'guided_advance', value: 'red' });
      await send({ type: 'guided_advance', value: '15' });
      await send({ type: 'guided_toggle', value: 'ribbon' });
      await send({ type: 'guided_toggle', value: 'luxury' });
      return send({ type: 'guided_advance', value: ['ribbon', 'luxury'] });
    }

    it('starts at the colour step with the flow’s own controls', async () => {
      const screen = await send({ type: 'guided_start' });

      expect(screen.screenId).toBe('bouquet:color');
      expect(screen.payload.text).toBe('🎨 Build your bouquet\n\nStep 1/3: Choose the main colour:');
      expect(lastRow(screen)).toEqual([{ label: '❌ Cancel', action: { type: 'nav_reset' } }]);
      expect(h.dispatcher.hasActiveFlow(USER)).toBe(true);
    });

    it('walks to a priced summary', async () => {
      const summary = await buildToSummary();

      expect(summary.screenId).toBe('bouquet:summary');
      expect(summary.payload.text).toBe(
        '🌸 Your bouquet:\n\n' +
          '🎨 Colour: 🔴 Red\n' +
          '📊 Stems: 15 stems\n' +
          '✨ Add-ons: 🎀 Ribbon, 🎁 Luxury wrap\n\n' +
          '💰 Price: 2400₽'
      );
      expect(h.dispatcher.activeFlowStep(USER)).toBe(BouquetStep.SUMMARY);
    });

    it('marks ticked add-ons on the add-ons screen', async () => {
      await send({ type: 'guided_start' });
      await send({ type: 'guided_advance', value: 'white' });
      await send({ type: 'guided_advance', value: '7' });

      const screen = await send({ type: 'guided_toggle', value: 'toy' });

      expect(screen.screenId).toBe('bouquet:addons');
      expect(screen.payload.buttons[2]).toEqual([
        { label: '✓ 🧸 Soft toy +450₽', action: { type: 'guided_toggle', value: 'toy' } },
      ]);
      expect(lastRow(screen)).toEqual([
        { label: '◀️ Back', action: { type: 'guided_back' } },
        { label: '✅ Done', action: { type: 'guided_advance', value: ['toy'] } },
      ]);
    });

    it('re-prompts the same step on invalid input', async () => {
      await send({ type: 'guided_start' });

      const screen = await send({ type: 'guided_advance', value: 'chartreuse' });

      expect(screen.screenId).toBe('bouquet:color');
      expect(screen.payload.text).toBe(
        '⚠️ Unknown colour\n\n🎨 Build your bouquet\n\nStep 1/3: Choose the main colour:'
      );
    });

    it('steps back inside the flow without touching navigation', async () => {
      await send({ type: 'enter_screen', target: ScreenId.CATALOG });
      await send({ type: 'guided_start' });
      await send({ type: 'guided_advance', value: 'blue' });

      const screen = await send({ type: 'guided_back' });

      expect(screen.screenId).toBe('bouquet:color');
      expect(h.sessions.get(USER)?.currentScreen).toBe(ScreenId.CATALOG);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME]);
    });

    it('puts the finished bouquet in the cart and shows it', async () => {
      await buildToSummary();

      const screen = await send({ type: 'guided_finalize' });

      expect(screen.screenId).toBe(ScreenId.CART);
      expect(screen.payload.text.endsWith('💰 Total: 2400₽')).toBe(true);
      expect(lastRow(screen)).toEqual([BACK_BUTTON]);
      expect(h.dispatcher.hasActiveFlow(USER)).toBe(false);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME]);
      expect(await h.shop.getItems(String(USER))).toEqual([
        { type: 'custom', color: 'red', quantity: '15', addons: ['ribbon', 'luxury'], price: 2400 },
      ]);
    });

    it('keeps the flow when the cart rejects the bouquet', async () => {
      await buildToSummary();
      vi.spyOn(h.shop, 'addBouquet').mockRejectedValue(new Error('cart offline'));

      const screen = await send({ type: 'guided_finalize' });

      expect(screen.screenId).toBe('bouquet:summary');
      expect(screen.payload.kind).toBe('error');
      expect(h.dispatcher.activeFlowStep(USER)).toBe(BouquetStep.SUMMARY);
      expect(h.sessions.get(USER)?.currentScreen).toBe(ScreenId.HOME);
    });

    it('asks to finish the remaining steps before finalizing', async () => {
      await send({ type: 'guided_start' });
      await send({ type: 'guided_advance', value: 'green' });

      const screen = await send({ type: 'guided_finalize' });

      expect(screen.screenId).toBe('bouquet:quantity');
      expect(screen.payload.text.startsWith('⚠️ Finish the remaining steps first.\n\n')).toBe(true);
    });

    it('offers a restart when no flow is active', async () => {
      const screen = await send({ type: 'guided_advance', value: 'red' });

      expect(screen.screenId).toBe('bouquet:none');
      expect(screen.payload.kind).toBe('error');
      expect(lastRow(screen)).toEqual([BACK_BUTTON]);
      expect(h.dispatcher.hasActiveFlow(USER)).toBe(false);
    });

    it('abandons the flow on reset', async () => {
      await send({ type: 'guided_start' });
      const abandon = vi.spyOn(h.builder, 'abandon');

      await send({ type: 'nav_reset' });

      expect(abandon).toHaveBeenCalledOnce();
      expect(h.logger.info).toHaveBeenCalledWith(
        { userId: String(USER), step: BouquetStep.COLOR },
        'Bouquet flow abandoned'
      );
      expect(h.dispatcher.hasActiveFlow(USER)).toBe(false);
      expect(h.dispatcher.activeFlowStep(USER)).toBeNull();
    });
  });

  describe('cart', () => {
    async function fillCart(): Promise<void> {
      await send({ type: 'guided_start' });
      await send({ type: 'guided_advance', value: 'yellow' });
      await send({ type: 'guided_advance', value: '5' });
      await send({ type: 'guided_advance', value: [] });
      await send({ type: 'guided_finalize' });
    }

    it('empties the cart and shows it', async () => {
      await fillCart();

      const screen = await send({ type: 'cart_clear' });

      expect(screen.screenId).toBe(ScreenId.CART);
      expect(screen.payload.text).toBe(
        `${CART_CLEARED_TEXT}\n\n🛒 Your cart is empty\n\nBuild a bouquet or browse the catalog.`
      );
      expect(lastRow(screen)).toEqual([BACK_BUTTON]);
      expect(await h.shop.getItems(String(USER))).toEqual([]);
      expect(h.sessions.get(USER)?.navStack).toEqual([ScreenId.HOME]);
    });

    it('keeps the cart and offers a retry when clearing fails', async () => {
      await fillCart();
      vi.spyOn(h.shop, 'clear').mockRejectedValue(new Error('cart offline'));

      const screen = await send({ type: 'cart_clear' });

      expect(screen).toEqual({
        screenId: ScreenId.CART,
        payload: {
          kind: 'error',
          text: '❌ Could not clear your cart. Please try again.',
          buttons: [[{ label: '🗑️ Clear cart', action: { type: 'cart_clear' } }], [BACK_BUTTON]],
        },
      });
      expect(await h.shop.getItems(String(USER))).toHaveLength(1);
    });
  });

  describe('adding a flower', () => {
    const ADMIN = 1;

    beforeEach(async () => {
      h = await createHarness([ADMIN]);
    });

    async function fillDraft(): Promise<RenderedScreen> {
      await send({ type: 'admin_entry' }, ADMIN);
      await send({ type: 'flower_draft_start' }, ADMIN);
      await send({ type: 'flower_draft_input', value: 'Sunny Tulips' }, ADMIN);
      await send({ type: 'flower_draft_input', value: 'Eleven yellow tulips' }, ADMIN);
      await send({ type: 'flower_draft_input', value: '1800' }, ADMIN);
      return send({ type: 'flower_draft_input', value: 'Tulips' }, ADMIN);
    }

    it('prompts for the name first', async () => {
      await send({ type: 'admin_entry' }, ADMIN);

      const screen = await send({ type: 'flower_draft_start' }, ADMIN);

      expect(screen.screenId).toBe('flower_draft:name');
      expect(screen.payload.text).toBe('➕ New flower\n\nStep 1/4: Send the flower name:');
      expect(screen.payload.buttons).toEqual([
        [{ label: '❌ Cancel', action: { type: 'flower_draft_cancel' } }],
      ]);
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBe(FlowerDraftStep.NAME);
    });

    it('re-prompts the price on a non-number', async () => {
      await send({ type: 'flower_draft_start' }, ADMIN);
      await send({ type: 'flower_draft_input', value: 'Sunny Tulips' }, ADMIN);
      await send({ type: 'flower_draft_input', value: 'Eleven yellow tulips' }, ADMIN);

      const screen = await send({ type: 'flower_draft_input', value: 'cheap' }, ADMIN);

      expect(screen.screenId).toBe('flower_draft:price');
      expect(screen.payload.text).toBe(
        '⚠️ Invalid price. Send a number, e.g. 1500\n\n' +
          '➕ New flower\n\n' +
          'Name: Sunny Tulips\n' +
          'Description: Eleven yellow tulips\n\n' +
          'Step 3/4: Send the price in ₽:'
      );
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBe(FlowerDraftStep.PRICE);
    });

    it('reviews and saves the flower into the catalog', async () => {
      const review = await fillDraft();
      expect(review.screenId).toBe('flower_draft:review');
      expect(review.payload.text).toBe(
        '🌸 New flower:\n\n' +
          'Name: Sunny Tulips\n' +
          'Description: Eleven yellow tulips\n' +
          'Price: 1800₽\n' +
          'Category: tulips\n\n' +
          'Save it to the catalog?'
      );

      const saved = await send({ type: 'flower_draft_save' }, ADMIN);

      expect(saved.screenId).toBe(ScreenId.ADMIN_LIST_FLOWERS);
      expect(saved.payload.text.startsWith('✅ Flower added (ID 6)\n\n📋 Flowers:')).toBe(true);
      expect(lastRow(saved)).toEqual([BACK_BUTTON]);
      expect(await h.shop.getFlower(6)).toEqual({
        id: 6,
        name: 'Sunny Tulips',
        description: 'Eleven yellow tulips',
        price: 1800,
        category: 'tulips',
        available: true,
      });
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBeNull();

      const back = await send({ type: 'nav_back' }, ADMIN);
      expect(back.screenId).toBe(ScreenId.ADMIN_MAIN);
    });

    it('keeps the draft when the catalog rejects it', async () => {
      await fillDraft();
      vi.spyOn(h.shop, 'addFlower').mockRejectedValue(new Error('catalog offline'));

      const screen = await send({ type: 'flower_draft_save' }, ADMIN);

      expect(screen.screenId).toBe('flower_draft:review');
      expect(screen.payload.kind).toBe('error');
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBe(FlowerDraftStep.REVIEW);
    });

    it('cancels back to the screen it was started from', async () => {
      await send({ type: 'admin_entry' }, ADMIN);
      await send({ type: 'flower_draft_start' }, ADMIN);

      const screen = await send({ type: 'flower_draft_cancel' }, ADMIN);

      expect(screen.screenId).toBe(ScreenId.ADMIN_MAIN);
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBeNull();
    });

    it('replaces a bouquet in progress, and the other way round', async () => {
      await send({ type: 'guided_start' }, ADMIN);

      await send({ type: 'flower_draft_start' }, ADMIN);
      expect(h.dispatcher.hasActiveFlow(ADMIN)).toBe(false);
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBe(FlowerDraftStep.NAME);

      await send({ type: 'guided_start' }, ADMIN);
      expect(h.dispatcher.activeDraftStep(ADMIN)).toBeNull();
      expect(h.dispatcher.activeFlowStep(ADMIN)).toBe(BouquetStep.COLOR);
    });

    it('is refused to non-admins', async () => {
      const screen = await send({ type: 'flower_draft_start' }, 2);

      expect(screen.payload.text).toBe(ADMIN_DENIED_TEXT);
      expect(h.dispatcher.activeDraftStep(2)).toBeNull();
    });

    it('drops the draft on reset', async () => {
      await send({ type: 'flower_draft_start' }, ADMIN);

      await send({ type: 'nav_reset' }, ADMIN);

      expect(h.dispatcher.activeDraftStep(ADMIN)).toBeNull();
      expect(h.logger.info).toHaveBeenCalledWith(
        { userId: String(ADMIN), step: FlowerDraftStep.NAME },
        'Flower draft abandoned'
      );
    });
  });
});
