import {
  CategorizedCatalog,
  OperationResult,
  ServiceMethod,
  StoreSummary,
  fail,
} from '../models.js';
import { errorMessage } from '../errors/index.js';
import { SessionStore } from '../session/SessionStore.js';
import { classifyCatalog } from '../catalog/CatalogClassifier.js';
import { OrderConfig } from '../../config/orderConfig.js';
import {
  IVendorOrderingClient,
  StoreLocatorAddress,
  VendorStore,
} from '../../infrastructure/clients/IVendorOrderingClient.js';
import { storeLogger as log } from '../../utils/logger.js';
import { isRecord, text, toNumberOrNull } from '../../utils/values.js';

const MAX_STORES = 5;
const MAX_SEARCH_RESULTS = 20;

export interface SearchHit {
  code: string;
  name: string;
  category: string;
  price: string;
  description: string;
}

export type FindStoresResult = OperationResult<{ stores: StoreSummary[]; selectedStoreId: string | null }>;
export type MenuResult = OperationResult<{ storeId: string; categories: CategorizedCatalog }>;
export type SearchResult = OperationResult<{ results: SearchHit[]; resultCount: number }>;

function summarizeStore(store: VendorStore): StoreSummary {
  const waits = isRecord(store.ServiceMethodEstimatedWaitMinutes) ? store.ServiceMethodEstimatedWaitMinutes : {};
  const delivery = isRecord(waits.Delivery) ? waits.Delivery : {};

  return {
    storeId: text(store.StoreID),
    address: text(store.AddressDescription).trim(),
    phone: text(store.Phone),
    isOpen: store.IsOnlineNow === true && store.AllowDeliveryOrders === true,
    deliveryMinutesMin: toNumberOrNull(delivery.Min),
    deliveryMinutesMax: toNumberOrNull(delivery.Max),
    minimumDeliveryOrderAmount: toNumberOrNull(store.MinimumDeliveryOrderAmount),
  };
}

// store lookup and menu browsing; classified menus are cached per store for the life of the process
export class StoreService {
  constructor(
    private readonly client: IVendorOrderingClient,
    private readonly session: SessionStore,
    private readonly config: OrderConfig
  ) {}

  // blank fields fall back to the configured delivery address; picks the closest open store
  async findStores(
    address: Partial<StoreLocatorAddress> = {},
    orderType: ServiceMethod = this.config.preferences.orderType
  ): Promise<FindStoresResult> {
    try {
      const lookup: StoreLocatorAddress = {
        street: address.street || this.config.address.street,
        city: address.city || this.config.address.city,
        region: address.region || this.config.address.region,
        postalCode: address.postalCode || this.config.address.postalCode,
      };

      const raw = await this.client.findStores(lookup, orderType);
      const nearest = raw.slice(0, MAX_STORES);
      const stores = nearest.map(summarizeStore);

      const openIdx = stores.findIndex(store => store.isOpen);
      if (openIdx >= 0) {
        this.session.selectStore(stores[openIdx].storeId, nearest[openIdx]);
      }

      return { success: true, stores, selectedStoreId: openIdx >= 0 ? stores[openIdx].storeId : null };
    } catch (error) {
      log.error({ err: error }, 'Error finding nearby stores');
      return fail('STORE_LOOKUP_FAILED', errorMessage(error));
    }
  }

  // category is a name from MENU_CATEGORIES or 'All'; an unknown name yields an empty list
  async getMenu(storeId?: string, category: string = 'All'): Promise<MenuResult> {
    const sid = storeId || this.session.storeId;
    if (!sid) {
      return fail('NO_STORE', 'No store selected. Find nearby stores first.');
    }

    try {
      const catalog = await this.loadCatalog(sid);

      // own keys only: a name like 'constructor' must not reach Object.prototype
      const items = Object.hasOwn(catalog, category) ? catalog[category] : [];
      const categories: CategorizedCatalog = category === 'All' ? catalog : { [category]: items };

      return { success: true, storeId: sid, categories };
    } catch (error) {
      log.error({ err: error, storeId: sid }, 'Error fetching menu');
      return fail('MENU_FETCH_FAILED', errorMessage(error));
    }
  }

  // always reads the live menu: product type and description are not in the cache
  async searchMenu(query: string, storeId?: string): Promise<SearchResult> {
    const sid = storeId || this.session.storeId;
    if (!sid) {
      return fail('NO_STORE', 'No store selected. Find nearby stores first.');
    }

    try {
      const menu = await this.client.getMenu(sid);
      if (!this.session.getCatalog(sid)) {
        this.session.cacheCatalog(sid, classifyCatalog(menu));
      }

      const needle = query.toLowerCase();
      const variants = isRecord(menu.variants) ? menu.variants : {};
      const results: SearchHit[] = [];

      for (const [code, item] of Object.entries(variants)) {
        if (!isRecord(item)) continue;
        const name = text(item.Name);
        const description = text(item.Description);
        if (name.toLowerCase().includes(needle) || description.toLowerCase().includes(needle)) {
          results.push({
            code,
            name,
            category: text(item.ProductType),
            price: text(item.Price),
            description,
          });
        }
        if (results.length === MAX_SEARCH_RESULTS) break;
      }

      return { success: true, results, resultCount: results.length };
    } catch (error) {
      log.error({ err: error, storeId: sid }, 'Error searching menu');
      return fail('SEARCH_FAILED', errorMessage(error));
    }
  }

  private async loadCatalog(storeId: string): Promise<CategorizedCatalog> {
    const cached = this.session.getCatalog(storeId);
    if (cached) return cached;

    const catalog = classifyCatalog(await this.client.getMenu(storeId));
    this.session.cacheCatalog(storeId, catalog);
    log.debug({ storeId, categories: Object.keys(catalog) }, 'Cached classified menu');
    return catalog;
  }
}
