// topping code -> portion ("1/1", "1/2", "2/2") -> amount ("1", "1.5", ...)
export type ItemOptions = Record<string, Record<string, string>>;

export interface CartItem {
  code: string;
  quantity: number;
  options: ItemOptions;
  specialInstructions: string;
}

export interface AddItemRequest {
  code: string;
  quantity?: number;
  options?: ItemOptions;
  specialInstructions?: string;
}

export const MENU_CATEGORIES = [
  'Pizza',
  'Wings',
  'Pasta',
  'Bread',
  'Drinks',
  'Desserts',
  'Coupons',
  'Other',
] as const;

export type MenuCategory = (typeof MENU_CATEGORIES)[number];

export interface MenuItem {
  code: string;
  name: string;
  price: string;
  description: string;
}

// category name -> items; key order is the order categories were first seen in
export type CategorizedCatalog = Record<string, MenuItem[]>;

export interface SessionRecord {
  storeId: string | null;
  cart: CartItem[];
}

export type ServiceMethod = 'Delivery' | 'Carryout';

export interface StoreSummary {
  storeId: string;
  address: string;
  phone: string;
  isOpen: boolean;
  deliveryMinutesMin: number | null;
  deliveryMinutesMax: number | null;
  minimumDeliveryOrderAmount: number | null;
}

export interface EstimateLine {
  code: string;
  basePrice: number;
  quantity: number;
}

export interface PriceEstimate {
  subtotal: number;
  tax: number;
  deliveryFee: number;
  discount: number;
  total: number;
  estimated: true;
}

export type GuardRejectionCode =
  | 'NOT_CONFIRMED'
  | 'NO_STORE'
  | 'EMPTY_CART'
  | 'INVALID_TIME'
  | 'SCHEDULED_TOO_SOON'
  | 'OVER_MAX'
  | 'INVALID_QUANTITY'
  | 'INVALID_INDEX'
  | 'NO_PHONE';

export type ExternalFailureCode =
  | 'PRICE_FAILED'
  | 'MENU_FETCH_FAILED'
  | 'PLACE_FAILED'
  | 'TRACK_FAILED'
  | 'STORE_LOOKUP_FAILED'
  | 'SEARCH_FAILED'
  | 'ADD_FAILED'
  | 'REMOVE_FAILED';

export type ResultCode = GuardRejectionCode | ExternalFailureCode;

export interface Failure {
  success: false;
  error: string;
  code: ResultCode;
}

export type Success<T extends object> = { success: true } & T;

export type OperationResult<T extends object> = Success<T> | Failure;

export function fail(code: ResultCode, error: string): Failure {
  return { success: false, error, code };
}
