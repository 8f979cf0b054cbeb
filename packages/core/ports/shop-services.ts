/**
 * Shop Collaborator Ports
 *
 * Catalog, cart, order history and user directory. These are external
 * collaborators of the navigation engine; only their interfaces matter here.
 */

import type { AddonId, BouquetOrder, ColorId, QuantityOption } from '../domain/bouquet.js';
import type { NewFlower } from '../domain/flower-draft.js';

// =============================================================================
// Catalog
// =============================================================================

export interface Flower {
  id: number;
  name: string;
  description: string;
  price: number;
  category: string;
  available: boolean;
  photoUrl?: string;
}

/**
 * Canned AI pick shown on a `preset:<id>` result screen.
 */
export interface RecommendationPreset {
  id: string;
  title: string;
  occasion: string;
  /** Catalog entry recommended for this occasion */
  flowerId: number;
  note: string;
}

export interface ICatalogService {
  listAvailable(): Promise<Flower[]>;
  listAll(): Promise<Flower[]>;
  getFlower(id: number): Promise<Flower | null>;
  /** Most ordered available flower, or the first available one */
  getPopular(): Promise<Flower | null>;
  listPresets(): Promise<RecommendationPreset[]>;
  getPreset(id: string): Promise<RecommendationPreset | null>;
  /** Store a new available entry and return it with its assigned id */
  addFlower(flower: NewFlower): Promise<Flower>;
}

// =============================================================================
// Cart
// =============================================================================

export type CartItem =
  | {
      type: 'custom';
      color: ColorId;
      quantity: QuantityOption;
      addons: AddonId[];
      price: number;
    }
  | {
      type: 'catalog';
      flowerId: number;
      name: string;
      price: number;
    };

export interface ICartService {
  getItems(userId: string): Promise<CartItem[]>;
  addBouquet(userId: string, bouquet: BouquetOrder): Promise<CartItem[]>;
  clear(userId: string): Promise<void>;
}

// =============================================================================
// Orders & Users
// =============================================================================

export type OrderStatus = 'pending' | 'paid' | 'processing' | 'delivered' | 'cancelled';

export interface Order {
  id: number;
  userId: string;
  items: CartItem[];
  totalPrice: number;
  deliveryAddress: string | null;
  status: OrderStatus;
  createdAt: Date;
}

export interface IOrderHistoryService {
  getLastOrder(userId: string): Promise<Order | null>;
  listRecentOrders(limit: number): Promise<Order[]>;
}

export interface ShopUser {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
  registeredAt: Date;
}

export interface IUserDirectory {
  /** Insert or refresh a user profile */
  upsert(user: Omit<ShopUser, 'registeredAt'>): Promise<ShopUser>;
  listRecentUsers(limit: number): Promise<ShopUser[]>;
}

/**
 * Bundle of collaborators handed to renderers and the dispatcher.
 */
export interface ShopServices {
  catalog: ICatalogService;
  cart: ICartService;
  orders: IOrderHistoryService;
  users: IUserDirectory;
}
