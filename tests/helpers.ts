import { OrderConfig, OrderConfigInput, parseOrderConfig } from '../src/config/orderConfig.js';
import { CartItem, Failure, OperationResult, Success } from '../src/domain/models.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00Z');
export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

export interface ConfigOverrides {
  customer?: Partial<OrderConfigInput['customer']>;
  payment?: Partial<OrderConfigInput['payment']>;
  preferences?: Partial<NonNullable<OrderConfigInput['preferences']>>;
}

export function testConfig(overrides: ConfigOverrides = {}): OrderConfig {
  return parseOrderConfig({
    customer: {
      firstName: 'Test',
      lastName: 'Customer',
      email: 'test@example.com',
      phone: '416-555-0100',
      ...overrides.customer,
    },
    address: {
      street: '100 Queen St W',
      city: 'Toronto',
      region: 'ON',
      postalCode: 'M5H 2N2',
    },
    payment: {
      cardNumber: '4111111111111111',
      expiration: '12/29',
      cvv: '123',
      billingPostalCode: 'M5H 2N2',
      ...overrides.payment,
    },
    preferences: {
      maxOrderAmount: 100,
      ...overrides.preferences,
    },
  });
}

export function cartItem(code: string, quantity = 1): CartItem {
  return { code, quantity, options: {}, specialInstructions: '' };
}

export function expectSuccess<T extends object>(result: OperationResult<T>): Success<T> {
  if (!result.success) throw new Error(`expected success, got ${result.code}: ${result.error}`);
  return result;
}

export function expectFailure<T extends object>(result: OperationResult<T>): Failure {
  if (result.success) throw new Error('expected a failure result');
  return result;
}

// attempt ids are random per run
export function withoutAttempt(line: string): string {
  return line.replace(/attempt=[0-9a-f-]{36}/, 'attempt=<id>');
}
