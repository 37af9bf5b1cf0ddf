import { describe, it, expect } from 'vitest';
import { categorize, classifyCatalog } from '../src/domain/catalog/CatalogClassifier.js';
import { VendorOrderingClientMock } from '../src/infrastructure/clients/VendorOrderingClientMock.js';
import { VendorMenu } from '../src/infrastructure/clients/IVendorOrderingClient.js';

function menuOf(variants: unknown, coupons: unknown = {}, data: unknown = { Variants: variants }): VendorMenu {
  return { variants, coupons, data };
}

describe('categorize', () => {
  it('matches on product type', () => {
    expect(categorize('Pasta', 'Chicken Alfredo', {})).toBe('Pasta');
  });

  it('matches on name when the product type says nothing', () => {
    expect(categorize('Sides', 'Parmesan Bread Bites', {})).toBe('Bread');
  });

  it('matches on tags', () => {
    expect(categorize('', 'Ginger Ale', { Beverage: true })).toBe('Drinks');
  });

  it('is case-insensitive', () => {
    expect(categorize('PASTA', 'PENNE', {})).toBe('Pasta');
  });

  it('takes the first category in priority order', () => {
    expect(categorize('', 'Pizza Wings Combo', {})).toBe('Pizza');
    expect(categorize('', 'Boneless Wing Bread Bowl', {})).toBe('Wings');
  });

  it('falls back to Other', () => {
    expect(categorize('Sauce', 'Ranch Dip', {})).toBe('Other');
  });
});

describe('classifyCatalog', () => {
  it('groups the menu and keeps the order categories were first seen in', async () => {
    const menu = await new VendorOrderingClientMock().getMenu('10391');
    const catalog = classifyCatalog(menu);

    expect(Object.keys(catalog)).toEqual(['Pizza', 'Wings', 'Bread', 'Drinks', 'Desserts', 'Coupons']);
    expect(catalog.Pizza).toEqual([
      { code: '14SCREEN', name: 'Large (14") Hand Tossed Pizza', price: '12.99', description: '' },
    ]);
    expect(catalog.Coupons).toEqual([
      { code: '9193', name: 'Mix & Match Deal', price: '8.99', description: 'Any two medium items' },
    ]);
  });

  it('keeps items in menu order within a category', () => {
    const catalog = classifyCatalog(
      menuOf({
        P12: { Name: 'Medium Pizza', ProductType: 'Pizza', Price: '10.99' },
        COKE: { Name: 'Coke Can', ProductType: 'Drinks', Price: '1.49' },
        P14: { Name: 'Large Pizza', ProductType: 'Pizza', Price: 12.99, Description: 'Hand tossed' },
      })
    );

    expect(catalog).toEqual({
      Pizza: [
        { code: 'P12', name: 'Medium Pizza', price: '10.99', description: '' },
        { code: 'P14', name: 'Large Pizza', price: '12.99', description: 'Hand tossed' },
      ],
      Drinks: [{ code: 'COKE', name: 'Coke Can', price: '1.49', description: '' }],
    });
  });

  it('leaves out Coupons when there are none', () => {
    const catalog = classifyCatalog(menuOf({ DIP: { Name: 'Garlic Dip', ProductType: 'Sauce' } }));

    expect(catalog).toEqual({ Other: [{ code: 'DIP', name: 'Garlic Dip', price: '', description: '' }] });
  });

  it('skips entries that are not objects', () => {
    const catalog = classifyCatalog(
      menuOf({ BAD: 'nope', DIP: { Name: 'Garlic Dip', ProductType: 'Sauce' } })
    );

    expect(catalog).toEqual({ Other: [{ code: 'DIP', name: 'Garlic Dip', price: '', description: '' }] });
  });

  it('falls back to the raw payload when a variant is malformed', () => {
    const variants = {
      A1: { Name: 42, ProductType: 'Pizza', Price: '1.00' },
      B2: { Name: 'Coke', ProductType: 'Drinks', Price: 2, Description: 'Cold' },
    };
    const catalog = classifyCatalog(menuOf(variants, { C1: { Name: 'Deal' } }));

    expect(catalog).toEqual({
      Other: [
        { code: 'A1', name: '42', price: '1.00', description: '' },
        { code: 'B2', name: 'Coke', price: '2', description: '' },
      ],
    });
  });

  it('uses the code as the name when the raw entry has none', () => {
    const variants = { A1: { ProductType: ['Pizza'] } };
    const catalog = classifyCatalog(menuOf(variants));

    expect(catalog).toEqual({ Other: [{ code: 'A1', name: 'A1', price: '', description: '' }] });
  });

  it('returns an empty catalog when neither shape is usable', () => {
    const catalog = classifyCatalog(menuOf({ A1: { Name: 7 } }, {}, null));

    expect(catalog).toEqual({});
  });

  it('does not throw on an empty payload', () => {
    expect(classifyCatalog(menuOf(undefined, undefined, undefined))).toEqual({});
  });
});
