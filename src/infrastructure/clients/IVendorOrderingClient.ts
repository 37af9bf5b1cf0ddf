import { ItemOptions, ServiceMethod } from '../../domain/models.js';

// Field names below follow the vendor's wire format (PascalCase).

export interface VendorAddress {
  Street: string;
  City: string;
  Region: string;
  PostalCode: string;
  Type: 'House';
  UnitNumber?: string;
  DeliveryInstructions?: string;
}

export interface VendorProduct {
  ID: number;
  Code: string;
  Qty: number;
  isNew: boolean;
  AutoRemove: boolean;
  Options: ItemOptions;
  Instructions?: string;
  // copied from the menu variant; the price/validate round trip may replace them
  Price?: string | number;
  Pricing?: Record<string, string | number>;
  [field: string]: unknown;
}

export interface VendorAmounts {
  Menu?: number;
  Discount?: number;
  Surcharge?: number;
  Tax?: number;
  DeliveryFee?: number;
  Customer?: number | string;
  Tip?: number;
  [field: string]: unknown;
}

export interface VendorStatusItem {
  Code: string;
  PulseCode?: number;
  [field: string]: unknown;
}

export interface CardPayment {
  Type: 'CreditCard';
  Amount: number;
  Number: string;
  CardType: string;
  Expiration: string;
  SecurityCode: string;
  PostalCode: string;
}

export interface PayAtDoorPayment {
  Type: 'Cash';
  Amount: number;
}

export type PaymentInstruction = CardPayment | PayAtDoorPayment;

export interface VendorOrderBody {
  Address: VendorAddress;
  Coupons: unknown[];
  CustomerID: string;
  Email: string;
  FirstName: string;
  LastName: string;
  Phone: string;
  LanguageCode: string;
  Market: string;
  Currency: string;
  OrderChannel: string;
  OrderMethod: string;
  Payments: PaymentInstruction[];
  Products: VendorProduct[];
  ServiceMethod: ServiceMethod;
  SourceOrganizationURI: string;
  StoreID: string;
  Tags: Record<string, unknown>;
  Version: string;
  NoCombine: boolean;
  Partners: Record<string, unknown>;
  OrderInfoCollection: unknown[];
  Amounts?: VendorAmounts;
  FutureOrderTime?: string;
  StatusItems?: VendorStatusItem[];
  EstimatedWaitMinutes?: string;
  OrderID?: string;
  StoreOrderID?: string;
  PulseOrderGuid?: string;
  [field: string]: unknown;
}

export interface VendorOrder {
  Order: VendorOrderBody;
  Status?: number;
  StatusItems?: VendorStatusItem[];
}

export interface VendorOrderResponse {
  Status: number;
  // read fields through utils/values helpers
  Order?: Record<string, unknown>;
  StatusItems?: VendorStatusItem[];
}

// raw payload of the menu endpoint plus the two mappings the classifier reads
export interface VendorMenu {
  variants: unknown;
  coupons: unknown;
  data: unknown;
}

export interface StoreLocatorAddress {
  street: string;
  city: string;
  region: string;
  postalCode: string;
}

export type VendorStore = Record<string, unknown>;

// OrderStatus, OrderDescription, StoreID, OrderID, StartTime, DriverName, DriverPhone
export type TrackerOrderStatus = Record<string, unknown>;

export interface TrackerPayload {
  OrderStatuses: TrackerOrderStatus[];
}

export interface IVendorOrderingClient {
  findStores(address: StoreLocatorAddress, serviceType: ServiceMethod): Promise<VendorStore[]>;
  getMenu(storeId: string): Promise<VendorMenu>;
  // both merge the response's Order fields into `order` in place
  priceOrder(order: VendorOrder): Promise<VendorOrderResponse>;
  validateOrder(order: VendorOrder): Promise<VendorOrderResponse>;
  // never retried: a repeated submit can charge twice
  placeOrder(order: VendorOrder, payment: PaymentInstruction): Promise<VendorOrderResponse>;
  trackOrder(phone: string, storeId?: string): Promise<TrackerPayload>;
}
