import { OperationResult, PriceEstimate, fail } from '../models.js';
import { errorMessage } from '../errors/index.js';
import { SessionStore } from '../session/SessionStore.js';
import { IPriceEstimator, snapshotBasePrices } from '../strategies/IPriceEstimator.js';
import { OrderBuilder, digitsOnly } from '../order/OrderBuilder.js';
import { OrderGuardPipeline, PlaceOrderRequest, PlaceOrderResult } from '../order/OrderGuardPipeline.js';
import { OrderConfig } from '../../config/orderConfig.js';
import { IVendorOrderingClient, VendorStatusItem } from '../../infrastructure/clients/IVendorOrderingClient.js';
import { orderLogger as log } from '../../utils/logger.js';
import { roundMoney, text, toNumber } from '../../utils/values.js';

export interface VendorPricing {
  subtotal: number;
  discount: number;
  surcharge: number;
  tax: number;
  deliveryFee: number;
  total: number;
}

export type PriceOrderResult = OperationResult<{
  storeId: string;
  pricing: VendorPricing;
  estimate: PriceEstimate;
  suggestedTip: number;
  estimatedWaitMinutes: string;
}>;

export type ValidateOrderResult = OperationResult<{
  valid: boolean;
  warnings: string[];
  errors: string[];
}>;

export type TrackOrderResult = OperationResult<{
  orderStatus: string;
  orderDescription: string;
  storeId?: string;
  orderId?: string;
  startTime?: string;
  driverName?: string;
  driverPhone?: string;
}>;

// pulse code 1 marks a blocking problem, anything else is advisory
const BLOCKING_PULSE_CODE = 1;

export class OrderService {
  constructor(
    private readonly session: SessionStore,
    private readonly config: OrderConfig,
    private readonly builder: OrderBuilder,
    private readonly client: IVendorOrderingClient,
    private readonly estimator: IPriceEstimator,
    private readonly pipeline: OrderGuardPipeline
  ) {}

  async priceOrder(): Promise<PriceOrderResult> {
    const storeId = this.session.storeId;
    if (!storeId) return fail('NO_STORE', 'No store selected. Find nearby stores first.');
    if (this.session.cart.length === 0) return fail('EMPTY_CART', 'Cart is empty. Add items first.');

    try {
      const order = await this.builder.build(this.session.cart, storeId, this.config);
      const lines = snapshotBasePrices(order);
      await this.client.priceOrder(order);

      const amounts = order.Order.Amounts ?? {};
      const estimate = this.estimator.estimate(lines);
      const pricing: VendorPricing = {
        subtotal: toNumber(amounts.Menu),
        discount: toNumber(amounts.Discount),
        surcharge: toNumber(amounts.Surcharge),
        tax: toNumber(amounts.Tax),
        deliveryFee: toNumber(amounts.DeliveryFee),
        total: toNumber(amounts.Customer),
      };
      const tipBase = pricing.subtotal > 0 ? pricing.subtotal : estimate.subtotal;

      return {
        success: true,
        storeId,
        pricing,
        estimate,
        suggestedTip: roundMoney((tipBase * this.config.preferences.defaultTipPercent) / 100),
        estimatedWaitMinutes: text(order.Order.EstimatedWaitMinutes),
      };
    } catch (error) {
      log.error({ err: error, storeId }, 'Error pricing order');
      return fail('PRICE_FAILED', errorMessage(error));
    }
  }

  // advisory: a failed validation call is reported as an invalid order, not an error
  async validateOrder(): Promise<ValidateOrderResult> {
    const storeId = this.session.storeId;
    if (!storeId) return fail('NO_STORE', 'No store selected. Find nearby stores first.');
    if (this.session.cart.length === 0) return fail('EMPTY_CART', 'Cart is empty. Add items first.');

    try {
      const order = await this.builder.build(this.session.cart, storeId, this.config);
      const response = await this.client.validateOrder(order);

      const statusItems: VendorStatusItem[] = response.StatusItems ?? order.Order.StatusItems ?? [];
      const errors: string[] = [];
      const warnings: string[] = [];
      for (const item of statusItems) {
        if (item.PulseCode === BLOCKING_PULSE_CODE) errors.push(item.Code);
        else warnings.push(item.Code);
      }

      return { success: true, valid: response.Status >= 0 && errors.length === 0, warnings, errors };
    } catch (error) {
      log.error({ err: error, storeId }, 'Error validating order');
      return { success: true, valid: false, warnings: [], errors: [errorMessage(error)] };
    }
  }

  async placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    return this.pipeline.run(request);
  }

  async trackOrder(phone?: string, storeId?: string): Promise<TrackOrderResult> {
    const phoneNumber = digitsOnly(phone || this.config.customer.phone);
    if (!phoneNumber) {
      return fail('NO_PHONE', 'No phone number provided and none in config.');
    }

    try {
      const payload = await this.client.trackOrder(phoneNumber, storeId || this.session.storeId || undefined);
      const [latest] = payload.OrderStatuses;
      if (!latest) {
        return {
          success: true,
          orderStatus: 'No active orders found',
          orderDescription: 'No orders are currently being tracked for this phone number.',
        };
      }

      return {
        success: true,
        orderStatus: text(latest.OrderStatus, 'Unknown'),
        orderDescription: text(latest.OrderDescription),
        storeId: text(latest.StoreID),
        orderId: text(latest.OrderID),
        startTime: text(latest.StartTime),
        driverName: text(latest.DriverName),
        driverPhone: text(latest.DriverPhone),
      };
    } catch (error) {
      log.error({ err: error }, 'Error tracking order');
      return fail('TRACK_FAILED', errorMessage(error));
    }
  }
}
