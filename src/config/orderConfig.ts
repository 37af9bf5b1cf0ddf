import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../domain/errors/index.js';

const customerSchema = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().email(),
  phone: z.string().min(1),
});

const addressSchema = z.object({
  street: z.string().min(1),
  unit: z.string().default(''),
  city: z.string().min(1),
  region: z.string().min(1),
  postalCode: z.string().min(1),
  country: z.string().default('ca'),
  deliveryInstructions: z.string().default(''),
});

const paymentSchema = z.object({
  cardNumber: z.string().default(''),
  expiration: z.string().default(''), // MM/YY
  cvv: z.string().default(''),
  billingPostalCode: z.string().default(''),
  // cash or card handed over at the door, nothing charged online
  payAtDoor: z.boolean().default(false),
});

const preferencesSchema = z.object({
  orderType: z.enum(['Delivery', 'Carryout']).default('Delivery'),
  defaultTipPercent: z.number().int().min(0).max(100).default(15),
  maxOrderAmount: z.number().min(0).nullable().default(100),
  preferredStoreId: z.string().nullable().default(null),
});

export const orderConfigSchema = z.object({
  customer: customerSchema,
  address: addressSchema,
  payment: paymentSchema,
  preferences: preferencesSchema.default({}),
});

export type OrderConfig = z.infer<typeof orderConfigSchema>;
export type OrderConfigInput = z.input<typeof orderConfigSchema>;

export function parseOrderConfig(data: unknown): OrderConfig {
  const result = orderConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid order config: ${issues}`);
  }

  const { payment } = result.data;
  if (!payment.payAtDoor && payment.cardNumber === '') {
    throw new ConfigError('Order config needs payment.cardNumber unless payment.payAtDoor is true.');
  }
  return result.data;
}

export function loadOrderConfig(path: string): OrderConfig {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Config file not found at ${path}. Copy config.example.json to the config path and fill in your details.`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Config file at ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseOrderConfig(data);
}
