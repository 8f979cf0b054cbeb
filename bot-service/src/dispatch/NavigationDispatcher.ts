/**
 * NavigationDispatcher
 *
 * Front door of the navigation core. For each inbound event it:
 * 1. Serializes on the user's session (other users proceed concurrently)
 * 2. Applies the action to the navigation stack or the bouquet flow
 * 3. Renders the resulting screen
 * 4. Attaches the uniform back button to every screen except home
 *
 * Two guided flows live beside the stack: the bouquet builder and the admin
 * flower draft. At most one of them is active, since both take typed answers.
 */

import type { Logger } from 'pino';
import type { BouquetBuilder, FlowerDraftBuilder, GuidedFlowResult } from '@petal/adapters/guided-flow';
import type { NavigationEngine } from '@petal/adapters/navigation';
import type {
  BouquetFlowState,
  BouquetStep,
  FlowerDraftState,
  FlowerDraftStep,
  GuidedFlowError,
  NavigationSession,
  UserId,
} from '@petal/core/domain';
import { HOME_SCREEN, InvalidStepInputError, ScreenId, isAdminScreen } from '@petal/core/domain';
import type {
  Flower,
  InboundAction,
  ISessionStore,
  RenderContext,
  RenderedScreen,
  ShopServices,
} from '@petal/core/ports';
import { errorPayload } from '@petal/core/ports';
import { clearCartButton } from '../screens/formatting.js';
import { presentBouquetStep, presentCartFailure, presentNoActiveFlow } from './bouquet-presenter.js';
import { BACK_BUTTON, MAIN_MENU_BUTTON } from './buttons.js';
import {
  presentFlowerDraftStep,
  presentFlowerSaveFailure,
  presentNoActiveDraft,
} from './flower-draft-presenter.js';
import type { ActionDispatcher, AdminPolicy, InboundEvent } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface NavigationDispatcherOptions {
  sessions: ISessionStore;
  navigation: NavigationEngine;
  builder: BouquetBuilder;
  flowerDrafts: FlowerDraftBuilder;
  services: ShopServices;
  admins: AdminPolicy;
  webAppUrl: string;
  logger: Logger;
}

export const ADMIN_DENIED_TEXT = '❌ You do not have admin rights';

export const CART_CLEARED_TEXT = '🗑️ Cart cleared';

type FlowerDraftAction = Extract<InboundAction, { type: `flower_draft_${string}` }>;

// =============================================================================
// Implementation
// =============================================================================

export class NavigationDispatcher implements ActionDispatcher {
  private readonly sessions: ISessionStore;
  private readonly navigation: NavigationEngine;
  private readonly builder: BouquetBuilder;
  private readonly flowerDrafts: FlowerDraftBuilder;
  private readonly services: ShopServices;
  private readonly admins: AdminPolicy;
  private readonly webAppUrl: string;
  private readonly log: Logger;

  constructor(options: NavigationDispatcherOptions) {
    this.sessions = options.sessions;
    this.navigation = options.navigation;
    this.builder = options.builder;
    this.flowerDrafts = options.flowerDrafts;
    this.services = options.services;
    this.admins = options.admins;
    this.webAppUrl = options.webAppUrl;
    this.log = options.logger.child({ component: 'NavigationDispatcher' });
  }

  /**
   * Apply one inbound action and return what to show.
   */
  async dispatch(event: InboundEvent): Promise<RenderedScreen> {
    return this.sessions.withSession(event.userId, (session) => this.handle(session, event));
  }

  /**
   * Whether free text from this user should be treated as bouquet input.
   */
  hasActiveFlow(userId: UserId): boolean {
    return this.activeFlowStep(userId) !== null;
  }

  activeFlowStep(userId: UserId): BouquetStep | null {
    return this.sessions.get(userId)?.guidedFlow?.step ?? null;
  }

  activeDraftStep(userId: UserId): FlowerDraftStep | null {
    return this.sessions.get(userId)?.flowerDraft?.step ?? null;
  }

  // ===========================================================================
  // Action Handling
  // ===========================================================================

  private async handle(session: NavigationSession, event: InboundEvent): Promise<RenderedScreen> {
    const { action } = event;
    this.log.debug(
      { userId: session.userId, action: action.type, screen: session.currentScreen },
      'Dispatching action'
    );

    switch (action.type) {
      case 'enter_screen':
        if (isAdminScreen(action.target) && !this.admins.isAdmin(event.userId)) {
          return this.refuseAdmin(session, action.target);
        }
        this.navigation.enter(session, action.target);
        return this.renderScreen(session, event);

      case 'nav_back':
        this.navigation.back(session);
        return this.renderScreen(session, event);

      case 'nav_reset':
        this.abandonFlows(session);
        this.navigation.reset(session);
        await this.recordVisit(event);
        return this.renderScreen(session, event);

      case 'admin_entry':
        if (!this.admins.isAdmin(event.userId)) {
          return this.refuseAdmin(session, ScreenId.ADMIN_MAIN);
        }
        this.abandonFlows(session);
        this.navigation.reset(session);
        this.navigation.rootlessJump(session, ScreenId.ADMIN_MAIN);
        return this.renderScreen(session, event);

      case 'guided_start':
        this.flowerDrafts.abandon(session);
        return presentBouquetStep(this.builder.start(session), this.builder.basePrice);

      case 'guided_advance':
        return this.presentFlowResult(session, this.builder.advance(session, action.value));

      case 'guided_toggle':
        return this.presentFlowResult(session, this.builder.toggleAddon(session, action.value));

      case 'guided_back':
        return this.presentFlowResult(session, this.builder.stepBack(session));

      case 'guided_finalize':
        return this.finalizeBouquet(session, event);

      case 'cart_clear':
        return this.clearCart(session, event);

      case 'flower_draft_start':
      case 'flower_draft_input':
      case 'flower_draft_back':
      case 'flower_draft_save':
      case 'flower_draft_cancel':
        if (!this.admins.isAdmin(event.userId)) {
          return this.refuseAdmin(session, action.type);
        }
        return this.handleFlowerDraft(session, event, action);
    }
  }

  private async handleFlowerDraft(
    session: NavigationSession,
    event: InboundEvent,
    action: FlowerDraftAction
  ): Promise<RenderedScreen> {
    switch (action.type) {
      case 'flower_draft_start':
        this.builder.abandon(session);
        return presentFlowerDraftStep(this.flowerDrafts.start(session));

      case 'flower_draft_input':
        return this.presentDraftResult(session, this.flowerDrafts.advance(session, action.value));

      case 'flower_draft_back':
        return this.presentDraftResult(session, this.flowerDrafts.stepBack(session));

      case 'flower_draft_save':
        return this.saveFlower(session, event);

      case 'flower_draft_cancel':
        this.flowerDrafts.abandon(session);
        return this.renderScreen(session, event);
    }
  }

  /**
   * Put the finished bouquet into the cart, then end the flow and show the cart.
   * The flow is only cleared once the cart accepted the bouquet.
   */
  private async finalizeBouquet(
    session: NavigationSession,
    event: InboundEvent
  ): Promise<RenderedScreen> {
    const preview = this.builder.summarize(session);
    if (!preview.success) {
      return this.presentFlowFailure(session, preview.error);
    }

    try {
      await this.services.cart.addBouquet(session.userId, preview.value);
    } catch (error) {
      this.log.error(
        { userId: session.userId, error: error instanceof Error ? error.message : String(error) },
        'Failed to add bouquet to cart'
      );
      return presentCartFailure();
    }

    const finalized = this.builder.finalize(session);
    if (!finalized.success) {
      return this.presentFlowFailure(session, finalized.error);
    }

    this.navigation.enter(session, ScreenId.CART);
    return this.renderScreen(session, event);
  }

  /**
   * Store the drafted flower, then end the draft and show the catalog list.
   * The draft is only cleared once the catalog accepted the entry.
   */
  private async saveFlower(session: NavigationSession, event: InboundEvent): Promise<RenderedScreen> {
    const preview = this.flowerDrafts.summarize(session);
    if (!preview.success) {
      return this.presentDraftFailure(session, preview.error);
    }

    let flower: Flower;
    try {
      flower = await this.services.catalog.addFlower(preview.value);
    } catch (error) {
      this.log.error(
        { userId: session.userId, error: error instanceof Error ? error.message : String(error) },
        'Failed to add flower to catalog'
      );
      return presentFlowerSaveFailure();
    }

    const finalized = this.flowerDrafts.finalize(session);
    if (!finalized.success) {
      return this.presentDraftFailure(session, finalized.error);
    }

    this.navigation.enter(session, ScreenId.ADMIN_LIST_FLOWERS);
    return withNotice(await this.renderScreen(session, event), `✅ Flower added (ID ${flower.id})`);
  }

  /**
   * Empty the user's cart and show it.
   */
  private async clearCart(session: NavigationSession, event: InboundEvent): Promise<RenderedScreen> {
    try {
      await this.services.cart.clear(session.userId);
    } catch (error) {
      this.log.error(
        { userId: session.userId, error: error instanceof Error ? error.message : String(error) },
        'Failed to clear cart'
      );
      return {
        screenId: session.currentScreen,
        payload: errorPayload('❌ Could not clear your cart. Please try again.', [
          [clearCartButton()],
          [BACK_BUTTON],
        ]),
      };
    }

    this.navigation.enter(session, ScreenId.CART);
    return withNotice(await this.renderScreen(session, event), CART_CLEARED_TEXT);
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  private async renderScreen(session: NavigationSession, event: InboundEvent): Promise<RenderedScreen> {
    const rendered = await this.navigation.render(session, this.contextFor(event));
    if (rendered.screenId === HOME_SCREEN) {
      return rendered;
    }
    return {
      screenId: rendered.screenId,
      payload: { ...rendered.payload, buttons: [...rendered.payload.buttons, [BACK_BUTTON]] },
    };
  }

  private presentFlowResult(
    session: NavigationSession,
    result: GuidedFlowResult<BouquetFlowState>
  ): RenderedScreen {
    if (!result.success) {
      return this.presentFlowFailure(session, result.error);
    }
    return presentBouquetStep(result.value, this.builder.basePrice);
  }

  /**
   * Re-prompt the current step, or offer a restart when there is no flow.
   */
  private presentFlowFailure(session: NavigationSession, error: GuidedFlowError): RenderedScreen {
    const flow = session.guidedFlow;
    if (error.code === 'no_active_flow' || !flow) {
      return presentNoActiveFlow();
    }
    return presentBouquetStep(flow, this.builder.basePrice, noticeFor(error));
  }

  private presentDraftResult(
    session: NavigationSession,
    result: GuidedFlowResult<FlowerDraftState>
  ): RenderedScreen {
    if (!result.success) {
      return this.presentDraftFailure(session, result.error);
    }
    return presentFlowerDraftStep(result.value);
  }

  private presentDraftFailure(session: NavigationSession, error: GuidedFlowError): RenderedScreen {
    const draft = session.flowerDraft;
    if (error.code === 'no_active_flow' || !draft) {
      return presentNoActiveDraft();
    }
    return presentFlowerDraftStep(draft, noticeFor(error));
  }

  private refuseAdmin(session: NavigationSession, target: string): RenderedScreen {
    this.log.warn({ userId: session.userId, target }, 'Admin access denied');
    return {
      screenId: session.currentScreen,
      payload: errorPayload(ADMIN_DENIED_TEXT, [[MAIN_MENU_BUTTON], [BACK_BUTTON]]),
    };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private abandonFlows(session: NavigationSession): void {
    this.builder.abandon(session);
    this.flowerDrafts.abandon(session);
  }

  private contextFor(event: InboundEvent): RenderContext {
    return {
      ...(event.profile ? { profile: event.profile } : {}),
      services: this.services,
      webAppUrl: this.webAppUrl,
    };
  }

  /**
   * Record the user in the directory. A failure does not block navigation.
   */
  private async recordVisit(event: InboundEvent): Promise<void> {
    if (!event.profile) {
      return;
    }
    try {
      await this.services.users.upsert(event.profile);
    } catch (error) {
      this.log.warn(
        { userId: event.profile.id, error: error instanceof Error ? error.message : String(error) },
        'Failed to record user visit'
      );
    }
  }
}

function noticeFor(error: GuidedFlowError): string {
  if (error.code === 'flow_incomplete') {
    return 'Finish the remaining steps first.';
  }
  return error instanceof InvalidStepInputError ? error.reason : error.message;
}

function withNotice(screen: RenderedScreen, notice: string): RenderedScreen {
  return {
    screenId: screen.screenId,
    payload: { ...screen.payload, text: `${notice}\n\n${screen.payload.text}` },
  };
}
