/**
 * Composition root for the navigation core.
 */

import { BouquetBuilder, FlowerDraftBuilder } from '@petal/adapters/guided-flow';
import { NavigationEngine, ScreenRegistry } from '@petal/adapters/navigation';
import { InMemorySessionStore } from '@petal/adapters/session';
import { InMemoryShop } from '@petal/adapters/shop';
import type { Config } from './config.js';
import { NavigationDispatcher, createAdminPolicy } from './dispatch/index.js';
import { registerAllScreens, registerPresetScreens } from './screens/index.js';
import { logger } from './utils/logger.js';

/**
 * Wire the navigation core together.
 */
export async function createDispatcher(config: Config): Promise<NavigationDispatcher> {
  logger.level = config.logLevel;

  const shop = new InMemoryShop({ logger });
  const services = shop.asServices();

  const registry = new ScreenRegistry(logger);
  registerAllScreens(registry);
  const presetCount = await registerPresetScreens(registry, services.catalog);
  logger.info({ screens: registry.list().length, presets: presetCount }, 'Screens registered');

  return new NavigationDispatcher({
    sessions: new InMemorySessionStore({ logger }),
    navigation: new NavigationEngine({
      registry,
      logger,
      maxDepth: config.navigation.maxStackDepth,
    }),
    builder: new BouquetBuilder({ logger, basePrice: config.bouquet.basePrice }),
    flowerDrafts: new FlowerDraftBuilder({ logger }),
    services,
    admins: createAdminPolicy(config.adminIds),
    webAppUrl: config.telegram.webAppUrl,
    logger,
  });
}
