import { ServiceMethod } from '../../domain/models.js';
import { VendorRequestError } from '../../domain/errors/index.js';
import { vendorLogger as log } from '../../utils/logger.js';
import {
  IVendorOrderingClient,
  PaymentInstruction,
  StoreLocatorAddress,
  TrackerPayload,
  VendorAmounts,
  VendorMenu,
  VendorOrder,
  VendorOrderResponse,
  VendorProduct,
  VendorStore,
} from './IVendorOrderingClient.js';

export type VendorOperation =
  | 'findStores'
  | 'getMenu'
  | 'priceOrder'
  | 'validateOrder'
  | 'placeOrder'
  | 'trackOrder';

export interface MockVendorData {
  stores: VendorStore[];
  // raw menu payload, same shape the menu endpoint returns
  menu: Record<string, unknown>;
  priceResponse: VendorOrderResponse;
  validateResponse: VendorOrderResponse;
  placeResponse: VendorOrderResponse;
  tracker: TrackerPayload;
}

export interface PlacedOrder {
  order: VendorOrder;
  payment: PaymentInstruction;
}

export function defaultMockData(): MockVendorData {
  return {
    stores: [
      {
        StoreID: '10391',
        AddressDescription: '100 Queen St W\nToronto, ON M5H 2N2\n',
        Phone: '416-555-0100',
        IsOnlineNow: true,
        AllowDeliveryOrders: true,
        ServiceMethodEstimatedWaitMinutes: { Delivery: { Min: 25, Max: 35 } },
        MinimumDeliveryOrderAmount: 12,
      },
    ],
    menu: {
      Variants: {
        '14SCREEN': {
          Name: 'Large (14") Hand Tossed Pizza',
          Price: '12.99',
          ProductType: 'Pizza',
          Tags: { Specialty: false },
          Pricing: { 'Price1-0': '12.99', 'Price1-1': '14.99' },
        },
        W08PHOTW: {
          Name: 'Hot Buffalo Wings (8 pc)',
          Price: '10.99',
          ProductType: 'Wings',
          Tags: {},
        },
        B8PCSCB: {
          Name: 'Stuffed Cheesy Bread',
          Price: '7.99',
          ProductType: 'Bread',
          Tags: {},
        },
        '2LCOKE': {
          Name: 'Coke 2-Litre',
          Price: '3.49',
          ProductType: 'Drinks',
          Tags: {},
        },
        MARBRWNE: {
          Name: 'Marbled Cookie Brownie',
          Price: '6.99',
          ProductType: 'Dessert',
          Tags: {},
        },
      },
      Coupons: {
        '9193': { Name: 'Mix & Match Deal', Price: '8.99', Description: 'Any two medium items' },
      },
    },
    priceResponse: { Status: 0, Order: { EstimatedWaitMinutes: '25-35' } },
    validateResponse: { Status: 0, Order: {}, StatusItems: [] },
    placeResponse: { Status: 1, Order: { OrderID: 'MOCK-ORDER-1' } },
    tracker: { OrderStatuses: [] },
  };
}

// In-memory vendor for tests and local runs. Mirrors the real API's habit of
// overwriting the product list with its own priced copy.
export class VendorOrderingClientMock implements IVendorOrderingClient {
  private data: MockVendorData;
  private failures = new Map<VendorOperation, string>();
  private callCounts = new Map<VendorOperation, number>();
  readonly placedOrders: PlacedOrder[] = [];

  constructor(data: Partial<MockVendorData> = {}) {
    this.data = { ...defaultMockData(), ...data };
  }

  async findStores(_address: StoreLocatorAddress, _serviceType: ServiceMethod): Promise<VendorStore[]> {
    this.enter('findStores');
    return this.data.stores.map(store => ({ ...store }));
  }

  async getMenu(_storeId: string): Promise<VendorMenu> {
    this.enter('getMenu');
    const menu = structuredClone(this.data.menu);
    return { variants: menu.Variants, coupons: menu.Coupons, data: menu };
  }

  async priceOrder(order: VendorOrder): Promise<VendorOrderResponse> {
    this.enter('priceOrder');
    return this.respond(order, this.data.priceResponse);
  }

  async validateOrder(order: VendorOrder): Promise<VendorOrderResponse> {
    this.enter('validateOrder');
    return this.respond(order, this.data.validateResponse);
  }

  async placeOrder(order: VendorOrder, payment: PaymentInstruction): Promise<VendorOrderResponse> {
    this.enter('placeOrder');
    order.Order.Payments = [payment];
    this.placedOrders.push({ order: structuredClone(order), payment });
    return this.respond(order, this.data.placeResponse);
  }

  async trackOrder(_phone: string, _storeId?: string): Promise<TrackerPayload> {
    this.enter('trackOrder');
    return structuredClone(this.data.tracker);
  }

  // Utility methods for testing
  setAmounts(amounts: VendorAmounts): void {
    this.data.priceResponse = {
      ...this.data.priceResponse,
      Order: { ...this.data.priceResponse.Order, Amounts: amounts },
    };
  }

  setResponse(operation: 'priceOrder' | 'validateOrder' | 'placeOrder', response: VendorOrderResponse): void {
    if (operation === 'priceOrder') this.data.priceResponse = response;
    else if (operation === 'validateOrder') this.data.validateResponse = response;
    else this.data.placeResponse = response;
  }

  setStores(stores: VendorStore[]): void {
    this.data.stores = stores;
  }

  setTracker(tracker: TrackerPayload): void {
    this.data.tracker = tracker;
  }

  failOn(operation: VendorOperation, message: string = 'simulated outage'): void {
    this.failures.set(operation, message);
  }

  callCount(operation: VendorOperation): number {
    return this.callCounts.get(operation) ?? 0;
  }

  private enter(operation: VendorOperation): void {
    this.callCounts.set(operation, this.callCount(operation) + 1);
    const failure = this.failures.get(operation);
    if (failure !== undefined) {
      log.debug({ operation }, 'Mock vendor failing on request');
      throw new VendorRequestError(operation, failure);
    }
  }

  private respond(order: VendorOrder, template: VendorOrderResponse): VendorOrderResponse {
    const response = structuredClone(template);
    const products: VendorProduct[] = order.Order.Products.map(({ Price: _price, Pricing: _pricing, ...rest }) => ({
      ...rest,
      CategoryCode: 'Priced',
    }));

    Object.assign(order.Order, response.Order ?? {}, { Products: products });
    order.Status = response.Status;
    if (response.StatusItems) order.StatusItems = response.StatusItems;
    return response;
  }
}
