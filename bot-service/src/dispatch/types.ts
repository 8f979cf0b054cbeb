/**
 * Dispatch Front Types
 */

import type { BouquetStep, FlowerDraftStep, UserId } from '@petal/core/domain';
import type { InboundAction, RenderedScreen, UserProfile } from '@petal/core/ports';

/**
 * One user action as delivered by the transport.
 */
export interface InboundEvent {
  userId: UserId;
  action: InboundAction;
  profile?: UserProfile;
}

/**
 * What the transport needs from the navigation core.
 */
export interface ActionDispatcher {
  dispatch(event: InboundEvent): Promise<RenderedScreen>;
  /** Step of the user's bouquet flow, or null when none is active */
  activeFlowStep(userId: UserId): BouquetStep | null;
  /** Step of the user's flower draft, or null when none is active */
  activeDraftStep(userId: UserId): FlowerDraftStep | null;
  hasActiveFlow(userId: UserId): boolean;
}

/**
 * Decides who may enter the admin area.
 */
export interface AdminPolicy {
  isAdmin(userId: UserId): boolean;
}

/**
 * Allow the listed Telegram ids. An empty list allows everyone.
 */
export function createAdminPolicy(adminIds: readonly number[]): AdminPolicy {
  const allowed = new Set(adminIds.map(String));
  return {
    isAdmin: (userId) => allowed.size === 0 || allowed.has(String(userId)),
  };
}
