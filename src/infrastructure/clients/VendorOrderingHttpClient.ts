/**
 * HTTP client for the vendor's ordering ("power") API.
 *
 * Every call goes out once with an explicit timeout. There is no retry layer:
 * place-order is not idempotent and a repeated request can charge the card
 * twice, so a failure is reported to the caller and left for a human to decide.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ServiceMethod } from '../../domain/models.js';
import { VendorRequestError, errorMessage } from '../../domain/errors/index.js';
import { vendorLogger as log } from '../../utils/logger.js';
import { isRecord } from '../../utils/values.js';
import {
  IVendorOrderingClient,
  PaymentInstruction,
  StoreLocatorAddress,
  TrackerPayload,
  VendorMenu,
  VendorOrder,
  VendorOrderResponse,
  VendorStore,
} from './IVendorOrderingClient.js';
import { MarketProfile } from './markets.js';

const DEFAULT_TIMEOUT_MS = 15000;

const statusItemSchema = z.object({
  Code: z.string(),
  PulseCode: z.number().optional(),
}).passthrough();

const orderResponseSchema = z.object({
  Status: z.number(),
  Order: z.record(z.unknown()).optional(),
  StatusItems: z.array(statusItemSchema).optional(),
}).passthrough();

const storeLocatorSchema = z.object({
  Stores: z.array(z.record(z.unknown())).default([]),
}).passthrough();

const trackerSchema = z.object({
  OrderStatuses: z.array(z.record(z.unknown())).default([]),
}).passthrough();

export class VendorOrderingHttpClient implements IVendorOrderingClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly profile: MarketProfile,
    timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {
    this.http = axios.create({
      baseURL: profile.baseUrl,
      headers: profile.headers,
      timeout: timeoutMs,
    });
  }

  async findStores(address: StoreLocatorAddress, serviceType: ServiceMethod): Promise<VendorStore[]> {
    const data = await this.send('store lookup', () =>
      this.http.get('/store-locator', {
        params: {
          s: address.street,
          c: `${address.city}, ${address.region} ${address.postalCode}`.trim(),
          type: serviceType,
        },
      })
    );
    return this.parse('store lookup', storeLocatorSchema, data).Stores;
  }

  async getMenu(storeId: string): Promise<VendorMenu> {
    const data = await this.send('menu', () =>
      this.http.get(`/store/${encodeURIComponent(storeId)}/menu`, {
        params: { lang: 'en', structured: true },
      })
    );
    if (!isRecord(data)) {
      throw new VendorRequestError('menu', 'response body is not an object');
    }
    return { variants: data.Variants, coupons: data.Coupons, data };
  }

  async priceOrder(order: VendorOrder): Promise<VendorOrderResponse> {
    return this.postOrder('price', '/price-order', order);
  }

  async validateOrder(order: VendorOrder): Promise<VendorOrderResponse> {
    return this.postOrder('validate', '/validate-order', order);
  }

  async placeOrder(order: VendorOrder, payment: PaymentInstruction): Promise<VendorOrderResponse> {
    order.Order.Payments = [payment];
    return this.postOrder('place', '/place-order', order);
  }

  async trackOrder(phone: string, storeId?: string): Promise<TrackerPayload> {
    const params: Record<string, string> = { Phone: phone, lang: 'en' };
    if (storeId) params.StoreID = storeId;

    const data = await this.send('tracking', () =>
      this.http.get(this.profile.trackerUrl, { params })
    );
    return this.parse('tracking', trackerSchema, data);
  }

  private async postOrder(
    operation: string,
    path: string,
    order: VendorOrder
  ): Promise<VendorOrderResponse> {
    const data = await this.send(operation, () => this.http.post(path, { Order: order.Order }));
    const response = this.parse(operation, orderResponseSchema, data);

    // the vendor echoes the whole order back with its own fields filled in
    if (response.Order) Object.assign(order.Order, response.Order);
    order.Status = response.Status;
    if (response.StatusItems) order.StatusItems = response.StatusItems;

    return response;
  }

  private async send(operation: string, request: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const response = await request();
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        log.error({ operation, status, code: error.code }, 'Vendor request failed');
        throw new VendorRequestError(operation, error.message, status);
      }
      throw new VendorRequestError(operation, errorMessage(error));
    }
  }

  private parse<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new VendorRequestError(operation, `unexpected response shape: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    return result.data;
  }
}
