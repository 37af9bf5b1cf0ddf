import Fastify, { FastifyError, FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { Env, parseEnv } from './config/env.js';
import { OrderConfig, loadOrderConfig } from './config/orderConfig.js';
import { AddItemRequest, Failure, MENU_CATEGORIES, ResultCode, ServiceMethod, Success } from './domain/models.js';
import { DomainError } from './domain/errors/index.js';
import { SessionStore } from './domain/session/SessionStore.js';
import { SessionLock } from './domain/session/SessionLock.js';
import { AuditLog, FileAuditSink, IAuditSink } from './domain/audit/AuditLog.js';
import { FlatRatePriceEstimator } from './domain/strategies/IPriceEstimator.js';
import { OrderBuilder } from './domain/order/OrderBuilder.js';
import { OrderGuardPipeline, CONFIRMATION_PHRASE } from './domain/order/OrderGuardPipeline.js';
import { CartService, MAX_QUANTITY, MIN_QUANTITY } from './domain/services/CartService.js';
import { StoreService } from './domain/services/StoreService.js';
import { OrderService } from './domain/services/OrderService.js';
import { IVendorOrderingClient } from './infrastructure/clients/IVendorOrderingClient.js';
import { VendorOrderingHttpClient } from './infrastructure/clients/VendorOrderingHttpClient.js';
import { VendorOrderingClientMock } from './infrastructure/clients/VendorOrderingClientMock.js';
import { getMarketProfile } from './infrastructure/clients/markets.js';
import { FileSessionStorage, ISessionStorage } from './infrastructure/storage/SessionStorage.js';
import logger from './utils/logger.js';

export interface AppOptions {
  env?: Env;
  orderConfig?: OrderConfig;
  client?: IVendorOrderingClient;
  sessionStorage?: ISessionStorage;
  auditSink?: IAuditSink;
  clock?: () => Date;
}

// guard rejections are the caller's to fix; *_FAILED means the vendor or the service broke
const STATUS_BY_CODE: Record<ResultCode, number> = {
  NOT_CONFIRMED: 400,
  INVALID_TIME: 400,
  INVALID_QUANTITY: 400,
  INVALID_INDEX: 400,
  NO_PHONE: 400,
  NO_STORE: 409,
  EMPTY_CART: 409,
  SCHEDULED_TOO_SOON: 422,
  OVER_MAX: 422,
  PRICE_FAILED: 502,
  MENU_FETCH_FAILED: 502,
  PLACE_FAILED: 502,
  TRACK_FAILED: 502,
  STORE_LOOKUP_FAILED: 502,
  SEARCH_FAILED: 502,
  ADD_FAILED: 500,
  REMOVE_FAILED: 500,
};

function sendResult(reply: FastifyReply, result: Success<object> | Failure): FastifyReply {
  const status = result.success ? 200 : STATUS_BY_CODE[result.code];
  return reply.code(status).send({ ...result, timestamp: new Date().toISOString() });
}

export async function buildApp(options: AppOptions = {}) {
  const env = options.env ?? parseEnv();
  const orderConfig = options.orderConfig ?? loadOrderConfig(env.CONFIG_PATH);

  const app = Fastify({ loggerInstance: logger });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Pizza Order Agent API',
        description: 'Cart, menu and guarded order placement for an ordering agent',
        version: '1.0.0',
      },
      servers: [
        {
          url: env.API_BASE_URL || `http://${env.HOST}:${env.PORT}`,
          description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'stores', description: 'Store lookup and menus' },
        { name: 'cart', description: 'Cart management operations' },
        { name: 'order', description: 'Pricing, validation, placement and tracking' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
  });

  // dependency injection
  const profile = getMarketProfile(env.MARKET);
  const client =
    options.client ??
    (env.VENDOR_CLIENT === 'mock'
      ? new VendorOrderingClientMock()
      : new VendorOrderingHttpClient(profile, env.VENDOR_TIMEOUT_MS));
  const session = new SessionStore(options.sessionStorage ?? new FileSessionStorage(env.STATE_PATH));
  const audit = new AuditLog(options.auditSink ?? new FileAuditSink(env.AUDIT_LOG_PATH), options.clock);
  const estimator = new FlatRatePriceEstimator({
    taxRate: env.ESTIMATE_TAX_RATE,
    deliveryFee: env.ESTIMATE_DELIVERY_FEE,
  });
  const builder = new OrderBuilder(client, profile);
  const pipeline = new OrderGuardPipeline(session, orderConfig, builder, client, estimator, audit, {
    dryRun: env.DRY_RUN,
    clock: options.clock,
  });

  const cartService = new CartService(session, orderConfig);
  const storeService = new StoreService(client, session, orderConfig);
  const orderService = new OrderService(session, orderConfig, builder, client, estimator, pipeline);
  const lock = new SessionLock();

  if (env.DRY_RUN) app.log.warn('DRY_RUN is on: orders go through every check but are never submitted');

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            dryRun: { type: 'boolean' },
            market: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', dryRun: env.DRY_RUN, market: env.MARKET, timestamp: new Date().toISOString() };
  });

  // === Store & Menu Routes ===

  app.post<{
    Body: { street?: string; city?: string; region?: string; postalCode?: string; orderType?: ServiceMethod };
  }>('/v1/stores/search', {
    schema: {
      tags: ['stores'],
      description: 'Find stores near an address (blank fields use the configured address). Selects the closest open store.',
      body: {
        type: 'object',
        properties: {
          street: { type: 'string' },
          city: { type: 'string' },
          region: { type: 'string' },
          postalCode: { type: 'string' },
          orderType: { type: 'string', enum: ['Delivery', 'Carryout'] },
        },
      },
    },
  }, async (request, reply) => {
    const { orderType, ...address } = request.body || {};
    const result = await lock.run(() => storeService.findStores(address, orderType));
    return sendResult(reply, result);
  });

  app.get<{
    Querystring: { storeId?: string; category?: string };
  }>('/v1/menu', {
    schema: {
      tags: ['stores'],
      description: `Categorized menu of the selected (or given) store. Categories: ${MENU_CATEGORIES.join(', ')}, All.`,
      querystring: {
        type: 'object',
        properties: {
          storeId: { type: 'string' },
          category: { type: 'string', default: 'All' },
        },
      },
    },
  }, async (request, reply) => {
    const { storeId, category } = request.query;
    return sendResult(reply, await storeService.getMenu(storeId, category));
  });

  app.get<{
    Querystring: { query: string; storeId?: string };
  }>('/v1/menu/search', {
    schema: {
      tags: ['stores'],
      description: 'Search menu items by name or description (max 20 results)',
      querystring: {
        type: 'object',
        required: ['query'],
        properties: {
          query: { type: 'string', minLength: 1 },
          storeId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { query, storeId } = request.query;
    return sendResult(reply, await storeService.searchMenu(query, storeId));
  });

  // === Cart Routes ===

  app.get('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'Current cart contents with cart indices',
    },
  }, async (_request, reply) => {
    return sendResult(reply, await lock.run(() => cartService.getCart()));
  });

  app.post<{
    Body: AddItemRequest;
  }>('/v1/cart/items', {
    schema: {
      tags: ['cart'],
      description: `Add an item by menu code. Quantity ${MIN_QUANTITY}-${MAX_QUANTITY}. Options: {"P": {"1/1": "1"}} adds pepperoni, full coverage.`,
      body: {
        type: 'object',
        required: ['code'],
        properties: {
          code: { type: 'string', minLength: 1 },
          quantity: { type: 'integer' },
          options: {
            type: 'object',
            additionalProperties: {
              type: 'object',
              additionalProperties: { type: 'string' },
            },
          },
          specialInstructions: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const itemRequest = request.body;
    return sendResult(reply, await lock.run(() => cartService.addItem(itemRequest)));
  });

  app.delete<{
    Params: { index: number };
  }>('/v1/cart/items/:index', {
    schema: {
      tags: ['cart'],
      description: 'Remove an item by cart index. Later items move down by one.',
      params: {
        type: 'object',
        required: ['index'],
        properties: {
          index: { type: 'integer' },
        },
      },
    },
  }, async (request, reply) => {
    const { index } = request.params;
    return sendResult(reply, await lock.run(() => cartService.removeItem(index)));
  });

  app.delete('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'Empty the cart and forget the selected store',
    },
  }, async (_request, reply) => {
    return sendResult(reply, await lock.run(() => cartService.clearCart()));
  });

  // === Order Routes ===

  app.post('/v1/order/price', {
    schema: {
      tags: ['order'],
      description: 'Vendor pricing plus a local estimate for the current cart. Does not place the order.',
    },
  }, async (_request, reply) => {
    return sendResult(reply, await lock.run(() => orderService.priceOrder()));
  });

  app.post('/v1/order/validate', {
    schema: {
      tags: ['order'],
      description: 'Ask the vendor whether the current order is acceptable, without placing it',
    },
  }, async (_request, reply) => {
    return sendResult(reply, await lock.run(() => orderService.validateOrder()));
  });

  app.post<{
    Body: { confirmOrder: string; tipAmount?: number; scheduledTime?: string };
  }>('/v1/order/place', {
    schema: {
      tags: ['order'],
      description: `PLACES A REAL ORDER AND CHARGES THE CARD. confirmOrder must be exactly '${CONFIRMATION_PHRASE}'. scheduledTime is ISO 8601, at least 30 minutes ahead.`,
      body: {
        type: 'object',
        required: ['confirmOrder'],
        properties: {
          confirmOrder: { type: 'string' },
          tipAmount: { type: 'number' },
          scheduledTime: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const placeRequest = request.body;
    return sendResult(reply, await lock.run(() => orderService.placeOrder(placeRequest)));
  });

  app.get<{
    Querystring: { phone?: string; storeId?: string };
  }>('/v1/order/track', {
    schema: {
      tags: ['order'],
      description: 'Status of the most recent order for a phone number (defaults to the configured phone)',
      querystring: {
        type: 'object',
        properties: {
          phone: { type: 'string' },
          storeId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { phone, storeId } = request.query;
    return sendResult(reply, await orderService.trackOrder(phone, storeId));
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler<FastifyError>((error, _request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        success: false,
        error: error.message,
        code: error.code,
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        success: false,
        error: 'Request validation failed',
        code: 'VALIDATION_ERROR',
        details: error.validation,
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    app.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      success: false,
      error: 'An unexpected error occurred',
      code: 'INTERNAL_SERVER_ERROR',
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start() {
  const env = parseEnv();
  const app = await buildApp({ env });

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`API docs: http://${env.HOST}:${env.PORT}/docs`);

    // close the server on SIGINT/SIGTERM
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error(err, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    logger.fatal(err, 'Failed to start');
    process.exit(1);
  });
}
