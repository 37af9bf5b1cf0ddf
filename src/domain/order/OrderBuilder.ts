import { CartItem, ServiceMethod } from '../models.js';
import { UnknownItemError } from '../errors/index.js';
import { OrderConfig } from '../../config/orderConfig.js';
import {
  IVendorOrderingClient,
  PaymentInstruction,
  VendorOrder,
  VendorProduct,
} from '../../infrastructure/clients/IVendorOrderingClient.js';
import { MarketProfile } from '../../infrastructure/clients/markets.js';
import { isRecord, toNumber } from '../../utils/values.js';

const CARD_TYPES: ReadonlyArray<readonly [string, RegExp]> = [
  ['VISA', /^4\d{12}(\d{3})?$/],
  ['MASTERCARD', /^(5[1-5]\d{4}|677189|2[2-7]\d{4})\d{10}$/],
  ['AMEX', /^3[47]\d{13}$/],
  ['DISCOVER', /^6(011|5\d{2})\d{12}$/],
  ['JCB', /^35\d{14}$/],
  ['DINERS', /^3(0[0-5]|[68]\d)\d{11}$/],
];

export function detectCardType(cardNumber: string): string {
  const digits = cardNumber.replace(/\D/g, '');
  return CARD_TYPES.find(([, pattern]) => pattern.test(digits))?.[0] ?? '';
}

export function digitsOnly(phone: string): string {
  return phone.replace(/\D/g, '');
}

// card-on-file or pay-at-door, chosen by config, never both
export function buildPayment(payment: OrderConfig['payment'], amount: number): PaymentInstruction {
  if (payment.payAtDoor) {
    return { Type: 'Cash', Amount: amount };
  }
  return {
    Type: 'CreditCard',
    Amount: amount,
    Number: payment.cardNumber.replace(/\D/g, ''),
    CardType: detectCardType(payment.cardNumber),
    Expiration: payment.expiration.replace(/\D/g, ''),
    SecurityCode: payment.cvv,
    PostalCode: payment.billingPostalCode.replace(/\s/g, ''),
  };
}

function pricingFields(variant: Record<string, unknown>): Pick<VendorProduct, 'Price' | 'Pricing'> {
  const fields: Pick<VendorProduct, 'Price' | 'Pricing'> = {};
  if (typeof variant.Price === 'string' || typeof variant.Price === 'number') {
    fields.Price = variant.Price;
  }
  if (isRecord(variant.Pricing)) {
    const pricing: Record<string, string | number> = {};
    for (const [point, value] of Object.entries(variant.Pricing)) {
      if (typeof value === 'string' || typeof value === 'number') pricing[point] = value;
    }
    fields.Pricing = pricing;
  }
  return fields;
}

// Turns the session cart plus customer config into the vendor's order shape.
export class OrderBuilder {
  constructor(
    private readonly client: IVendorOrderingClient,
    private readonly profile: MarketProfile
  ) {}

  async build(
    cart: readonly CartItem[],
    storeId: string,
    config: OrderConfig,
    serviceMethod: ServiceMethod = config.preferences.orderType
  ): Promise<VendorOrder> {
    const menu = await this.client.getMenu(storeId);
    const variants = isRecord(menu.variants) ? menu.variants : {};

    const products: VendorProduct[] = cart.map((item, idx) => {
      const variant = variants[item.code];
      if (!isRecord(variant)) throw new UnknownItemError(item.code, storeId);

      const product: VendorProduct = {
        ID: idx + 1,
        Code: item.code,
        Qty: item.quantity,
        isNew: true,
        AutoRemove: false,
        Options: item.options,
        ...pricingFields(variant),
      };
      if (item.specialInstructions) product.Instructions = item.specialInstructions;
      return product;
    });

    const { customer, address } = config;

    return {
      Order: {
        Address: {
          Street: address.street,
          City: address.city,
          Region: address.region,
          PostalCode: address.postalCode,
          Type: 'House',
          ...(address.unit ? { UnitNumber: address.unit } : {}),
          ...(address.deliveryInstructions ? { DeliveryInstructions: address.deliveryInstructions } : {}),
        },
        Coupons: [],
        CustomerID: '',
        Email: customer.email,
        FirstName: customer.firstName,
        LastName: customer.lastName,
        Phone: digitsOnly(customer.phone),
        ...this.profile.orderFields,
        OrderChannel: 'OLO',
        OrderMethod: 'Web',
        Payments: [],
        Products: products,
        ServiceMethod: serviceMethod,
        StoreID: storeId,
        Tags: {},
        Version: '1.0',
        NoCombine: true,
        Partners: {},
        OrderInfoCollection: [],
      },
    };
  }
}

// vendor total as a number, 0 when absent or unparseable
export function vendorTotal(order: VendorOrder): number {
  return toNumber(order.Order.Amounts?.Customer);
}
