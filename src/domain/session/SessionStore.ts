import { z } from 'zod';
import { CartItem, CategorizedCatalog, SessionRecord } from '../models.js';
import { InvalidIndexError } from '../errors/index.js';
import { ISessionStorage } from '../../infrastructure/storage/SessionStorage.js';
import { sessionLogger as log } from '../../utils/logger.js';

const cartItemSchema = z.object({
  code: z.string().min(1),
  quantity: z.number().int().min(1).max(10),
  options: z.record(z.record(z.string())).default({}),
  specialInstructions: z.string().default(''),
});

const sessionRecordSchema = z.object({
  storeId: z.string().nullable().default(null),
  cart: z.array(cartItemSchema).default([]),
});

/**
 * The one session of this process: cart, selected store and menu cache.
 *
 * Persistence is best-effort. `load` and `save` never throw; a broken storage
 * backend is logged and the cart keeps working in memory. There is no locking
 * here either, callers serialize mutations (see SessionLock).
 *
 * Cart indices are only stable until the next removal.
 */
export class SessionStore {
  private items: CartItem[] = [];
  private currentStoreId: string | null = null;
  private currentStoreInfo: Record<string, unknown> = {};
  private readonly menuCache = new Map<string, CategorizedCatalog>();

  constructor(private readonly storage: ISessionStorage) {
    this.load();
  }

  get cart(): readonly CartItem[] {
    return this.items;
  }

  get storeId(): string | null {
    return this.currentStoreId;
  }

  get storeInfo(): Readonly<Record<string, unknown>> {
    return this.currentStoreInfo;
  }

  load(): void {
    let raw: unknown;
    try {
      raw = this.storage.read();
    } catch (error) {
      log.warn({ err: error }, 'Could not read session record, starting empty');
      this.reset();
      return;
    }

    if (raw === null) {
      this.reset();
      return;
    }

    const parsed = sessionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Session record is malformed, starting empty');
      this.reset();
      return;
    }

    this.items = parsed.data.cart;
    this.currentStoreId = parsed.data.storeId;
    log.info({ storeId: this.currentStoreId, items: this.items.length }, 'Restored session');
  }

  save(): void {
    const record: SessionRecord = { storeId: this.currentStoreId, cart: this.items };
    try {
      this.storage.write(record);
    } catch (error) {
      log.warn({ err: error }, 'Could not persist session record, continuing in memory');
    }
  }

  addItem(item: CartItem): number {
    this.items.push({ ...item, options: structuredClone(item.options) });
    this.save();
    return this.items.length - 1;
  }

  removeItem(index: number): CartItem {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new InvalidIndexError(index, this.items.length);
    }
    const [removed] = this.items.splice(index, 1);
    this.save();
    return removed;
  }

  selectStore(storeId: string, info: Record<string, unknown> = {}): void {
    this.currentStoreId = storeId;
    this.currentStoreInfo = info;
    this.save();
  }

  // the menu cache is keyed by store id and stays
  clear(): void {
    this.items = [];
    this.currentStoreId = null;
    this.currentStoreInfo = {};
    this.save();
  }

  getCatalog(storeId: string): CategorizedCatalog | undefined {
    return this.menuCache.get(storeId);
  }

  cacheCatalog(storeId: string, catalog: CategorizedCatalog): void {
    this.menuCache.set(storeId, catalog);
  }

  private reset(): void {
    this.items = [];
    this.currentStoreId = null;
    this.currentStoreInfo = {};
  }
}
