/**
 * Shared test fixtures for the bot service.
 */

import { vi } from 'vitest';
import type { Logger } from 'pino';
import { snapshotSession, createSession } from '@petal/core/domain';
import type { SessionSnapshot, UserId } from '@petal/core/domain';
import type { RenderContext, UserProfile } from '@petal/core/ports';
import { InMemoryShop } from '@petal/adapters/shop';
import type { InMemoryShopOptions } from '@petal/adapters/shop';

export const WEBAPP_URL = 'https://shop.example.test/app/';

export function createMockLogger(): Logger {
  return {
    child: vi.fn().mockReturnThis(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Logger;
}

export function createShop(options: Partial<InMemoryShopOptions> = {}): InMemoryShop {
  return new InMemoryShop({
    logger: createMockLogger(),
    now: () => new Date('2024-06-01T08:00:00Z'),
    ...options,
  });
}

export function createRenderContext(shop: InMemoryShop, profile?: UserProfile): RenderContext {
  return {
    ...(profile ? { profile } : {}),
    services: shop.asServices(),
    webAppUrl: WEBAPP_URL,
  };
}

export function snapshotFor(userId: UserId): SessionSnapshot {
  return snapshotSession(createSession(userId));
}
