import { AddItemRequest, CartItem, ItemOptions, OperationResult, fail } from '../models.js';
import { InvalidIndexError, errorMessage } from '../errors/index.js';
import { SessionStore } from '../session/SessionStore.js';
import { OrderConfig } from '../../config/orderConfig.js';
import { sessionLogger as log } from '../../utils/logger.js';

export const MIN_QUANTITY = 1;
export const MAX_QUANTITY = 10;

export interface CartLine {
  cartIndex: number;
  code: string;
  quantity: number;
  options: ItemOptions;
  specialInstructions: string;
}

export type CartView = OperationResult<{ storeId: string | null; items: CartLine[]; itemCount: number }>;

export type AddItemResult = OperationResult<{
  cartIndex: number;
  item: { code: string; quantity: number; options: ItemOptions };
  cartTotalItems: number;
}>;

export type RemoveItemResult = OperationResult<{ removedItem: string; cartTotalItems: number }>;

// cart operations over the process session; indices are positions and shift on removal
export class CartService {
  constructor(
    private readonly session: SessionStore,
    private readonly config: OrderConfig
  ) {}

  async getCart(): Promise<CartView> {
    const items = this.session.cart.map((item, cartIndex) => ({ cartIndex, ...item }));
    return { success: true, storeId: this.session.storeId, items, itemCount: items.length };
  }

  async addItem(request: AddItemRequest): Promise<AddItemResult> {
    const quantity = request.quantity ?? 1;
    if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_QUANTITY) {
      return fail('INVALID_QUANTITY', `Quantity must be between ${MIN_QUANTITY} and ${MAX_QUANTITY}.`);
    }

    try {
      if (!this.session.storeId && this.config.preferences.preferredStoreId) {
        this.session.selectStore(this.config.preferences.preferredStoreId);
      }
      if (!this.session.storeId) {
        return fail('NO_STORE', 'No store selected. Find nearby stores first.');
      }

      const item: CartItem = {
        code: request.code,
        quantity,
        options: request.options ?? {},
        specialInstructions: request.specialInstructions ?? '',
      };
      const cartIndex = this.session.addItem(item);

      return {
        success: true,
        cartIndex,
        item: { code: item.code, quantity: item.quantity, options: item.options },
        cartTotalItems: this.session.cart.length,
      };
    } catch (error) {
      log.error({ err: error }, 'Error adding to cart');
      return fail('ADD_FAILED', errorMessage(error));
    }
  }

  async removeItem(cartIndex: number): Promise<RemoveItemResult> {
    try {
      const removed = this.session.removeItem(cartIndex);
      return { success: true, removedItem: removed.code, cartTotalItems: this.session.cart.length };
    } catch (error) {
      if (error instanceof InvalidIndexError) {
        return fail('INVALID_INDEX', error.message);
      }
      log.error({ err: error }, 'Error removing from cart');
      return fail('REMOVE_FAILED', errorMessage(error));
    }
  }

  // also forgets the selected store
  async clearCart(): Promise<OperationResult<{ message: string }>> {
    this.session.clear();
    return { success: true, message: 'Cart cleared.' };
  }
}
