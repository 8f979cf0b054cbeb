/**
 * InMemoryShop
 *
 * Process-local catalog, cart, order history and user directory.
 * Stands in for the database-backed collaborators; the navigation core only
 * sees the port interfaces.
 */

import type { Logger } from 'pino';
import type { BouquetOrder, NewFlower } from '@petal/core/domain';
import type {
  CartItem,
  Flower,
  ICartService,
  ICatalogService,
  IOrderHistoryService,
  IUserDirectory,
  Order,
  RecommendationPreset,
  ShopServices,
  ShopUser,
} from '@petal/core/ports';
import { SAMPLE_FLOWERS, SAMPLE_PRESETS } from './seed.js';

export interface InMemoryShopOptions {
  logger: Logger;
  flowers?: readonly Flower[];
  presets?: readonly RecommendationPreset[];
  orders?: readonly Order[];
  now?: () => Date;
}

export class InMemoryShop
  implements ICatalogService, ICartService, IOrderHistoryService, IUserDirectory
{
  private readonly flowers: Flower[];
  private readonly presets: RecommendationPreset[];
  private readonly orders: Order[];
  private readonly carts = new Map<string, CartItem[]>();
  private readonly users = new Map<number, ShopUser>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: InMemoryShopOptions) {
    this.log = options.logger.child({ component: 'InMemoryShop' });
    this.flowers = (options.flowers ?? SAMPLE_FLOWERS).map((flower) => ({ ...flower }));
    this.presets = (options.presets ?? SAMPLE_PRESETS).map((preset) => ({ ...preset }));
    this.orders = (options.orders ?? []).map((order) => ({ ...order, items: [...order.items] }));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Expose this shop through the collaborator bundle.
   */
  asServices(): ShopServices {
    return { catalog: this, cart: this, orders: this, users: this };
  }

  // ===========================================================================
  // Catalog
  // ===========================================================================

  async listAvailable(): Promise<Flower[]> {
    return this.flowers.filter((flower) => flower.available);
  }

  async listAll(): Promise<Flower[]> {
    return [...this.flowers].sort((a, b) => a.id - b.id);
  }

  async getFlower(id: number): Promise<Flower | null> {
    return this.flowers.find((flower) => flower.id === id) ?? null;
  }

  async getPopular(): Promise<Flower | null> {
    const available = await this.listAvailable();
    if (available.length === 0) {
      return null;
    }

    const counts = new Map<number, number>();
    for (const order of this.orders) {
      for (const item of order.items) {
        if (item.type === 'catalog') {
          counts.set(item.flowerId, (counts.get(item.flowerId) ?? 0) + 1);
        }
      }
    }

    let popular = available[0] ?? null;
    let best = 0;
    for (const flower of available) {
      const count = counts.get(flower.id) ?? 0;
      if (count > best) {
        best = count;
        popular = flower;
      }
    }
    return popular;
  }

  async listPresets(): Promise<RecommendationPreset[]> {
    return [...this.presets];
  }

  async getPreset(id: string): Promise<RecommendationPreset | null> {
    return this.presets.find((preset) => preset.id === id) ?? null;
  }

  async addFlower(flower: NewFlower): Promise<Flower> {
    const id = this.flowers.reduce((max, existing) => Math.max(max, existing.id), 0) + 1;
    const record: Flower = { id, ...flower, available: true };
    this.flowers.push(record);
    this.log.info({ flowerId: id, name: record.name, price: record.price }, 'Flower added to catalog');
    return { ...record };
  }

  // ===========================================================================
  // Cart
  // ===========================================================================

  async getItems(userId: string): Promise<CartItem[]> {
    return [...(this.carts.get(userId) ?? [])];
  }

  async addBouquet(userId: string, bouquet: BouquetOrder): Promise<CartItem[]> {
    const item: CartItem = {
      type: 'custom',
      color: bouquet.color,
      quantity: bouquet.quantity,
      addons: [...bouquet.addons],
      price: bouquet.price,
    };
    const items = [...(this.carts.get(userId) ?? []), item];
    this.carts.set(userId, items);
    this.log.info({ userId, price: item.price, cartSize: items.length }, 'Bouquet added to cart');
    return [...items];
  }

  async clear(userId: string): Promise<void> {
    const removed = this.carts.get(userId)?.length ?? 0;
    this.carts.delete(userId);
    this.log.info({ userId, removed }, 'Cart cleared');
  }

  // ===========================================================================
  // Orders
  // ===========================================================================

  async getLastOrder(userId: string): Promise<Order | null> {
    let last: Order | null = null;
    for (const order of this.orders) {
      if (order.userId === userId && (!last || order.createdAt >= last.createdAt)) {
        last = order;
      }
    }
    return last;
  }

  async listRecentOrders(limit: number): Promise<Order[]> {
    return [...this.orders]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  async upsert(user: Omit<ShopUser, 'registeredAt'>): Promise<ShopUser> {
    const existing = this.users.get(user.id);
    const record: ShopUser = { ...user, registeredAt: existing?.registeredAt ?? this.now() };
    this.users.set(user.id, record);
    if (!existing) {
      this.log.info({ userId: user.id, username: user.username }, 'User registered');
    }
    return record;
  }

  async listRecentUsers(limit: number): Promise<ShopUser[]> {
    return [...this.users.values()]
      .sort((a, b) => b.registeredAt.getTime() - a.registeredAt.getTime())
      .slice(0, limit);
  }
}
