import { describe, it, expect, beforeEach } from 'vitest';
import { StoreService } from '../src/domain/services/StoreService.js';
import { SessionStore } from '../src/domain/session/SessionStore.js';
import { VendorOrderingClientMock } from '../src/infrastructure/clients/VendorOrderingClientMock.js';
import { InMemorySessionStorage } from '../src/infrastructure/storage/SessionStorage.js';
import { VendorStore } from '../src/infrastructure/clients/IVendorOrderingClient.js';
import { expectFailure, expectSuccess, testConfig } from './helpers.js';

function store(id: string, open: boolean): VendorStore {
  return {
    StoreID: id,
    AddressDescription: `${id} Main St\n`,
    Phone: '555-0100',
    IsOnlineNow: open,
    AllowDeliveryOrders: true,
    ServiceMethodEstimatedWaitMinutes: { Delivery: { Min: 20, Max: '30' } },
  };
}

describe('StoreService', () => {
  let client: VendorOrderingClientMock;
  let session: SessionStore;
  let storeService: StoreService;

  beforeEach(() => {
    client = new VendorOrderingClientMock();
    session = new SessionStore(new InMemorySessionStorage());
    storeService = new StoreService(client, session, testConfig());
  });

  describe('findStores', () => {
    it('summarizes stores and selects the first open one', async () => {
      client.setStores([store('1', false), store('2', true), store('3', true)]);

      const result = expectSuccess(await storeService.findStores());

      expect(result.selectedStoreId).toBe('2');
      expect(session.storeId).toBe('2');
      expect(session.storeInfo).toMatchObject({ StoreID: '2' });
      expect(result.stores[0]).toEqual({
        storeId: '1',
        address: '1 Main St',
        phone: '555-0100',
        isOpen: false,
        deliveryMinutesMin: 20,
        deliveryMinutesMax: 30,
        minimumDeliveryOrderAmount: null,
      });
    });

    it('returns at most five stores', async () => {
      client.setStores(['1', '2', '3', '4', '5', '6', '7'].map(id => store(id, true)));

      const result = expectSuccess(await storeService.findStores());

      expect(result.stores.map(s => s.storeId)).toEqual(['1', '2', '3', '4', '5']);
    });

    it('selects nothing when every store is closed', async () => {
      client.setStores([store('1', false)]);

      const result = expectSuccess(await storeService.findStores());

      expect(result.selectedStoreId).toBeNull();
      expect(session.storeId).toBeNull();
    });

    it('reports a lookup failure', async () => {
      client.failOn('findStores');

      const result = expectFailure(await storeService.findStores({ street: '1 Elm St' }));

      expect(result.code).toBe('STORE_LOOKUP_FAILED');
      expect(result.error).toBe('Vendor findStores request failed: simulated outage');
    });
  });

  describe('getMenu', () => {
    it('needs a store', async () => {
      const result = expectFailure(await storeService.getMenu());

      expect(result.code).toBe('NO_STORE');
    });

    it('classifies once and serves the cache afterwards', async () => {
      session.selectStore('10391');

      const first = expectSuccess(await storeService.getMenu());
      const second = expectSuccess(await storeService.getMenu());

      expect(client.callCount('getMenu')).toBe(1);
      expect(second.categories).toEqual(first.categories);
      expect(first.storeId).toBe('10391');
    });

    it('filters by category', async () => {
      const result = expectSuccess(await storeService.getMenu('10391', 'Drinks'));

      expect(result.categories).toEqual({
        Drinks: [{ code: '2LCOKE', name: 'Coke 2-Litre', price: '3.49', description: '' }],
      });
    });

    it('returns an empty list for an unknown category', async () => {
      const result = expectSuccess(await storeService.getMenu('10391', 'Sandwiches'));

      expect(result.categories).toEqual({ Sandwiches: [] });
    });

    it.each(['constructor', 'toString', 'hasOwnProperty', '__proto__'])(
      'treats the inherited name %s as an unknown category',
      async category => {
        const result = expectSuccess(await storeService.getMenu('10391', category));

        expect(Object.keys(result.categories)).toEqual([category]);
        expect(result.categories[category]).toEqual([]);
      }
    );

    it('reports a fetch failure', async () => {
      client.failOn('getMenu');

      const result = expectFailure(await storeService.getMenu('10391'));

      expect(result.code).toBe('MENU_FETCH_FAILED');
    });
  });

  describe('searchMenu', () => {
    it('matches name and description without regard to case', async () => {
      const result = expectSuccess(await storeService.searchMenu('WINGS', '10391'));

      expect(result.resultCount).toBe(1);
      expect(result.results).toEqual([
        { code: 'W08PHOTW', name: 'Hot Buffalo Wings (8 pc)', category: 'Wings', price: '10.99', description: '' },
      ]);
    });

    it('fills the menu cache on the way', async () => {
      await storeService.searchMenu('pizza', '10391');

      expect(session.getCatalog('10391')).toBeDefined();
    });

    it('caps results at twenty', async () => {
      const variants: Record<string, unknown> = {};
      for (let i = 0; i < 25; i++) {
        variants[`P${i}`] = { Name: `Pizza ${i}`, ProductType: 'Pizza', Price: '9.99' };
      }
      client = new VendorOrderingClientMock({ menu: { Variants: variants } });
      storeService = new StoreService(client, session, testConfig());

      const result = expectSuccess(await storeService.searchMenu('pizza', '10391'));

      expect(result.resultCount).toBe(20);
    });

    it('reports a search failure', async () => {
      client.failOn('getMenu');

      const result = expectFailure(await storeService.searchMenu('pizza', '10391'));

      expect(result.code).toBe('SEARCH_FAILED');
    });
  });
});
