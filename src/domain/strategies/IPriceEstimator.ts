import { EstimateLine, PriceEstimate } from '../models.js';
import { VendorOrder } from '../../infrastructure/clients/IVendorOrderingClient.js';
import { roundMoney, toNumber } from '../../utils/values.js';

// zero-extra-topping price point in a variant's Pricing map
export const BASE_PRICE_KEY = 'Price1-0';

export interface IPriceEstimator {
  estimate(lines: readonly EstimateLine[]): PriceEstimate;
}

export interface EstimatePolicy {
  taxRate?: number;
  deliveryFee?: number;
}

// flat-rate estimate: sum of base prices, one tax rate, one delivery fee.
// Vendor discounts are not modelled, so discount is always 0.
export class FlatRatePriceEstimator implements IPriceEstimator {
  private readonly taxRate: number;
  private readonly deliveryFee: number;

  constructor(policy: EstimatePolicy = {}) {
    this.taxRate = policy.taxRate ?? 0.15;
    this.deliveryFee = policy.deliveryFee ?? 4.99;
  }

  estimate(lines: readonly EstimateLine[]): PriceEstimate {
    const subtotal = roundMoney(lines.reduce((sum, line) => sum + line.basePrice * line.quantity, 0));

    // rounding to 2 decimals to avoid floating point weirdness
    const tax = roundMoney(subtotal * this.taxRate);
    const deliveryFee = roundMoney(this.deliveryFee);
    const total = roundMoney(subtotal + tax + deliveryFee);

    return { subtotal, tax, deliveryFee, discount: 0, total, estimated: true };
  }
}

/**
 * Copies each product's base price out of the order. Must run before the
 * order goes to the vendor: the price/validate round trip replaces the
 * product list in place, and reading afterwards yields zeros.
 */
export function snapshotBasePrices(order: VendorOrder): EstimateLine[] {
  return order.Order.Products.map(product => {
    const pointPrice = product.Pricing?.[BASE_PRICE_KEY];
    return {
      code: product.Code,
      basePrice: toNumber(pointPrice ?? product.Price),
      quantity: product.Qty,
    };
  });
}
