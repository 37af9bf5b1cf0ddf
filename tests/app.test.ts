import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildApp } from '../src/index.js';
import { parseEnv } from '../src/config/env.js';
import { InMemoryAuditSink } from '../src/domain/audit/AuditLog.js';
import { CONFIRMATION_PHRASE, DRY_RUN_ORDER_ID } from '../src/domain/order/OrderGuardPipeline.js';
import { VendorOrderingClientMock } from '../src/infrastructure/clients/VendorOrderingClientMock.js';
import { InMemorySessionStorage } from '../src/infrastructure/storage/SessionStorage.js';
import { fixedClock, testConfig, withoutAttempt } from './helpers.js';

type App = Awaited<ReturnType<typeof buildApp>>;
type ApiBody = Record<string, unknown>;

describe('HTTP API', () => {
  let app: App;
  let client: VendorOrderingClientMock;
  let sink: InMemoryAuditSink;

  async function start(dryRun: boolean): Promise<App> {
    return buildApp({
      env: parseEnv({ NODE_ENV: 'test', DRY_RUN: dryRun ? 'true' : 'false' }),
      orderConfig: testConfig(),
      client,
      sessionStorage: new InMemorySessionStorage(),
      auditSink: sink,
      clock: fixedClock,
    });
  }

  async function fillCart(): Promise<void> {
    await app.inject({ method: 'POST', url: '/v1/stores/search', payload: {} });
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { code: '14SCREEN', quantity: 2 } });
  }

  beforeEach(async () => {
    client = new VendorOrderingClientMock();
    sink = new InMemoryAuditSink();
    app = await start(false);
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json<ApiBody>()).toMatchObject({ status: 'ok', dryRun: false, market: 'CA' });
  });

  it('walks from store search to a placed order', async () => {
    const search = await app.inject({ method: 'POST', url: '/v1/stores/search', payload: {} });
    expect(search.json<ApiBody>().selectedStoreId).toBe('10391');

    const added = await app.inject({
      method: 'POST',
      url: '/v1/cart/items',
      payload: { code: '14SCREEN', quantity: 2 },
    });
    expect(added.statusCode).toBe(200);
    expect(added.json<ApiBody>().cartIndex).toBe(0);

    const placed = await app.inject({
      method: 'POST',
      url: '/v1/order/place',
      payload: { confirmOrder: CONFIRMATION_PHRASE },
    });
    expect(placed.statusCode).toBe(200);
    expect(placed.json<ApiBody>()).toMatchObject({ success: true, orderId: 'MOCK-ORDER-1', totalCharged: 34.87 });

    const cart = await app.inject({ method: 'GET', url: '/v1/cart' });
    expect(cart.json<ApiBody>()).toMatchObject({ storeId: null, itemCount: 0 });
    expect(sink.lines.map(withoutAttempt)).toEqual([
      '2026-03-01T12:00:00Z | PLACE_ORDER | CONFIRMED | attempt=<id> | store=10391 | items=["14SCREEN x2"] | total=34.87 | estimated=true | order_id=MOCK-ORDER-1 | payment=CreditCard',
    ]);
  });

  it('refuses to place without the confirmation phrase', async () => {
    await fillCart();

    const response = await app.inject({ method: 'POST', url: '/v1/order/place', payload: { confirmOrder: 'yes' } });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiBody>()).toMatchObject({ success: false, code: 'NOT_CONFIRMED' });
    expect(client.callCount('placeOrder')).toBe(0);
  });

  it('maps an over-limit order to 422', async () => {
    client.setAmounts({ Customer: 180 });
    await fillCart();

    const response = await app.inject({
      method: 'POST',
      url: '/v1/order/place',
      payload: { confirmOrder: CONFIRMATION_PHRASE },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json<ApiBody>().code).toBe('OVER_MAX');
  });

  it('never submits in dry-run mode', async () => {
    await app.close();
    app = await start(true);
    await fillCart();

    const response = await app.inject({
      method: 'POST',
      url: '/v1/order/place',
      payload: { confirmOrder: CONFIRMATION_PHRASE },
    });

    expect(response.json<ApiBody>()).toMatchObject({ success: true, orderId: DRY_RUN_ORDER_ID, dryRun: true });
    expect(client.callCount('placeOrder')).toBe(0);
  });

  it('rejects a quantity out of range', async () => {
    await fillCart();

    const response = await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { code: '2LCOKE', quantity: 11 } });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiBody>()).toMatchObject({ success: false, code: 'INVALID_QUANTITY' });
  });

  it('validates request bodies', async () => {
    const response = await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { quantity: 1 } });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiBody>().code).toBe('VALIDATION_ERROR');
  });

  it('removes items by index', async () => {
    await fillCart();

    const missing = await app.inject({ method: 'DELETE', url: '/v1/cart/items/3' });
    expect(missing.statusCode).toBe(400);
    expect(missing.json<ApiBody>().code).toBe('INVALID_INDEX');

    const removed = await app.inject({ method: 'DELETE', url: '/v1/cart/items/0' });
    expect(removed.json<ApiBody>()).toMatchObject({ success: true, removedItem: '14SCREEN', cartTotalItems: 0 });
  });

  it('clears the cart', async () => {
    await fillCart();

    const response = await app.inject({ method: 'DELETE', url: '/v1/cart' });

    expect(response.json<ApiBody>()).toMatchObject({ success: true, message: 'Cart cleared.' });
  });

  it('needs a store for the menu', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/menu' });

    expect(response.statusCode).toBe(409);
    expect(response.json<ApiBody>().code).toBe('NO_STORE');
  });

  it('serves one menu category', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/menu?storeId=10391&category=Drinks' });

    expect(response.statusCode).toBe(200);
    expect(response.json<ApiBody>().categories).toEqual({
      Drinks: [{ code: '2LCOKE', name: 'Coke 2-Litre', price: '3.49', description: '' }],
    });
  });

  it('requires a search query', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/menu/search' });

    expect(response.statusCode).toBe(400);
  });

  it('reports a vendor outage on pricing as 502', async () => {
    client.failOn('priceOrder');
    await fillCart();

    const response = await app.inject({ method: 'POST', url: '/v1/order/price' });

    expect(response.statusCode).toBe(502);
    expect(response.json<ApiBody>().code).toBe('PRICE_FAILED');
  });
});
