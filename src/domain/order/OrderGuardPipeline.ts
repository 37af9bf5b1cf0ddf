/**
 * Order placement guard pipeline.
 *
 *   Unconfirmed -> StoreChecked -> CartChecked -> ScheduleChecked -> Priced
 *     -> AmountChecked -> DryRun | Submitted -> Cleared
 *
 * Each gate either advances or ends the run with a coded rejection and an
 * ABORTED audit line. Nothing is mutated before submission succeeds (or a
 * dry run is accepted); only then is the session cleared.
 *
 * The vendor calls made here are never retried. A place-order request that
 * timed out may still have gone through.
 */

import { v4 as uuidv4 } from 'uuid';
import { OperationResult, PriceEstimate, ResultCode, fail } from '../models.js';
import { SubmissionError, errorMessage } from '../errors/index.js';
import { SessionStore } from '../session/SessionStore.js';
import { AuditFields, AuditLog } from '../audit/AuditLog.js';
import { IPriceEstimator, snapshotBasePrices } from '../strategies/IPriceEstimator.js';
import { OrderBuilder, buildPayment, vendorTotal } from './OrderBuilder.js';
import { OrderConfig } from '../../config/orderConfig.js';
import {
  IVendorOrderingClient,
  VendorOrderResponse,
} from '../../infrastructure/clients/IVendorOrderingClient.js';
import { orderLogger as log } from '../../utils/logger.js';
import { roundMoney, text } from '../../utils/values.js';

export const CONFIRMATION_PHRASE = 'YES_PLACE_MY_ORDER';
export const MIN_SCHEDULE_LEAD_MINUTES = 30;
export const DRY_RUN_ORDER_ID = 'DRY_RUN_NO_ORDER';
export const UNKNOWN_ORDER_ID = 'UNKNOWN';

export type GuardStage =
  | 'Unconfirmed'
  | 'StoreChecked'
  | 'CartChecked'
  | 'ScheduleChecked'
  | 'Priced'
  | 'AmountChecked'
  | 'DryRun'
  | 'Submitted'
  | 'Cleared';

export interface PlaceOrderRequest {
  confirmOrder: string;
  tipAmount?: number;
  // ISO 8601, e.g. 2026-02-27T18:30:00 (no offset means server local time)
  scheduledTime?: string;
}

export interface PlacedOrder {
  orderId: string;
  dryRun: boolean;
  totalCharged: number;
  // true when the vendor gave no total and the local estimate was used
  totalIsEstimate: boolean;
  estimate: PriceEstimate;
  tip: number;
  scheduledFor: string | null;
  message: string;
}

export type PlaceOrderResult = OperationResult<PlacedOrder>;

export interface PipelineOptions {
  dryRun: boolean;
  clock?: () => Date;
}

export interface ScheduledTime {
  at: Date;
  // the same instant in server local time, in the vendor's format
  formatted: string;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const pad = (value: number): string => String(value).padStart(2, '0');

// the vendor reads FutureOrderTime as local time without an offset
function formatLocal(at: Date): string {
  const date = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
  return `${date} ${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
}

/** Parses an ISO 8601 date or date-time; null when it is not one. */
export function parseScheduledTime(input: string): ScheduledTime | null {
  const match = ISO_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '0', zone] = match;
  const parts = [y, mo, d, h, mi, s].map(Number);
  const [year, month, day, hour, minute, second] = parts;
  const millis = Math.floor(Number(`0.${frac}`) * 1000);

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null;
  // rejects 2026-02-30 and friends
  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day) return null;

  let at: Date;
  if (zone === undefined) {
    at = new Date(year, month - 1, day, hour, minute, second, millis);
  } else {
    let offsetMinutes = 0;
    if (zone !== 'Z') {
      const sign = zone.startsWith('-') ? -1 : 1;
      const digits = zone.slice(1).replace(':', '');
      offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)));
    }
    at = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMinutes * 60_000);
  }

  return { at, formatted: formatLocal(at) };
}

function firstOrderId(response: VendorOrderResponse): string {
  const body = response.Order ?? {};
  for (const field of ['OrderID', 'StoreOrderID', 'PulseOrderGuid']) {
    const value = text(body[field]);
    if (value !== '') return value;
  }
  return UNKNOWN_ORDER_ID;
}

function rejectionReasons(response: VendorOrderResponse): string[] {
  const items = response.StatusItems ?? [];
  return items.map(item => item.Code).filter(code => code !== '');
}

export class OrderGuardPipeline {
  private readonly dryRun: boolean;
  private readonly clock: () => Date;

  constructor(
    private readonly session: SessionStore,
    private readonly config: OrderConfig,
    private readonly builder: OrderBuilder,
    private readonly client: IVendorOrderingClient,
    private readonly estimator: IPriceEstimator,
    private readonly audit: AuditLog,
    options: PipelineOptions
  ) {
    this.dryRun = options.dryRun;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    const attempt = uuidv4();
    let stage: GuardStage = 'Unconfirmed';

    const abort = (code: ResultCode, error: string, fields: AuditFields = {}): PlaceOrderResult => {
      this.audit.record('ABORTED', { attempt, reason: code, ...fields });
      log.info({ attempt, code, stage }, 'Order placement aborted');
      return fail(code, error);
    };

    // 1. explicit confirmation phrase, nothing else counts
    if (request.confirmOrder !== CONFIRMATION_PHRASE) {
      return abort(
        'NOT_CONFIRMED',
        `Order not confirmed. Pass confirmOrder='${CONFIRMATION_PHRASE}' to proceed.`
      );
    }

    // 2. store
    const storeId = this.session.storeId;
    if (!storeId) {
      return abort('NO_STORE', 'No store selected. Find nearby stores first.');
    }
    stage = 'StoreChecked';

    // 3. cart
    const cart = [...this.session.cart];
    if (cart.length === 0) {
      return abort('EMPTY_CART', 'Cart is empty. Add items first.', { store: storeId });
    }
    stage = 'CartChecked';

    // 4. schedule, measured against the clock now rather than when the order is built
    let scheduled: ScheduledTime | null = null;
    if (request.scheduledTime) {
      scheduled = parseScheduledTime(request.scheduledTime);
      if (!scheduled) {
        return abort(
          'INVALID_TIME',
          `Invalid scheduledTime format: ${request.scheduledTime}. Use ISO 8601 (e.g. 2026-02-27T18:30:00).`,
          { time: request.scheduledTime }
        );
      }
      const earliest = this.clock().getTime() + MIN_SCHEDULE_LEAD_MINUTES * 60_000;
      if (scheduled.at.getTime() < earliest) {
        return abort(
          'SCHEDULED_TOO_SOON',
          `Scheduled time must be at least ${MIN_SCHEDULE_LEAD_MINUTES} minutes in the future.`,
          { time: request.scheduledTime }
        );
      }
    }
    stage = 'ScheduleChecked';

    const itemSummary = cart.map(item => `${item.code} x${item.quantity}`);

    try {
      // 5. pricing
      const order = await this.builder.build(cart, storeId, this.config);
      if (scheduled) order.Order.FutureOrderTime = scheduled.formatted;

      const lines = snapshotBasePrices(order);
      await this.client.priceOrder(order);
      const estimate = this.estimator.estimate(lines);

      const tip = request.tipAmount !== undefined && request.tipAmount > 0 ? roundMoney(request.tipAmount) : 0;
      if (tip > 0) {
        order.Order.Amounts = { ...order.Order.Amounts, Tip: tip };
      }

      const authoritative = vendorTotal(order);
      const totalIsEstimate = authoritative <= 0;
      const total = roundMoney((totalIsEstimate ? estimate.total : authoritative) + tip);
      stage = 'Priced';

      // 6. ceiling; 0 or null turns it off
      const maxAmount = this.config.preferences.maxOrderAmount;
      if (maxAmount && total > maxAmount) {
        return abort(
          'OVER_MAX',
          `Order total $${total.toFixed(2)} exceeds max $${maxAmount.toFixed(2)}`,
          { store: storeId, total, max: maxAmount, estimated: totalIsEstimate }
        );
      }
      stage = 'AmountChecked';

      // 7. simulation: full pipeline, no submit call
      if (this.dryRun) {
        stage = 'DryRun';
        this.audit.record('DRY_RUN', {
          attempt,
          store: storeId,
          items: JSON.stringify(itemSummary),
          total,
          estimated: totalIsEstimate,
          scheduled: scheduled?.formatted,
        });
        this.session.clear();
        stage = 'Cleared';

        return {
          success: true,
          orderId: DRY_RUN_ORDER_ID,
          dryRun: true,
          totalCharged: total,
          totalIsEstimate,
          estimate,
          tip,
          scheduledFor: scheduled?.formatted ?? null,
          message: 'DRY RUN: order was NOT placed. Set DRY_RUN=false to place real orders.',
        };
      }

      // 8. submission
      const payment = buildPayment(this.config.payment, total);
      const response = await this.client.placeOrder(order, payment);
      if (response.Status < 0) {
        throw new SubmissionError(response.Status, rejectionReasons(response));
      }
      stage = 'Submitted';

      // 9. an order that went through is a success even without an id
      const orderId = firstOrderId(response);
      this.audit.record('CONFIRMED', {
        attempt,
        store: storeId,
        items: JSON.stringify(itemSummary),
        total,
        estimated: totalIsEstimate,
        order_id: orderId,
        payment: payment.Type,
        scheduled: scheduled?.formatted,
      });
      this.session.clear();
      stage = 'Cleared';
      log.info({ attempt, orderId, storeId, total }, 'Order placed');

      return {
        success: true,
        orderId,
        dryRun: false,
        totalCharged: total,
        totalIsEstimate,
        estimate,
        tip,
        scheduledFor: scheduled?.formatted ?? null,
        message: scheduled
          ? `Order scheduled for ${scheduled.formatted}. Track it with the tracking endpoint.`
          : `Order ${orderId} placed successfully. Track it with the tracking endpoint.`,
      };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ err: error, attempt, stage }, 'Error placing order');
      this.audit.record('ERROR', { attempt, reason: 'PLACE_FAILED', stage, store: storeId, error: message });
      return fail('PLACE_FAILED', message);
    }
  }
}
