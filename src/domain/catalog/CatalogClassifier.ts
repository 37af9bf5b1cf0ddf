import { CategorizedCatalog, MenuCategory, MenuItem } from '../models.js';
import { VendorMenu } from '../../infrastructure/clients/IVendorOrderingClient.js';
import { catalogLogger as log } from '../../utils/logger.js';
import { isRecord, text } from '../../utils/values.js';
import { errorMessage } from '../errors/index.js';

// checked in this order; the first set with a hit wins
const CATEGORY_KEYWORDS: ReadonlyArray<readonly [MenuCategory, readonly string[]]> = [
  ['Pizza', ['pizza']],
  ['Wings', ['wings', 'wing']],
  ['Pasta', ['pasta']],
  ['Bread', ['bread', 'breadsticks']],
  ['Drinks', ['drinks', 'beverage', 'coke', 'sprite']],
  ['Desserts', ['desserts', 'dessert']],
];

class CatalogShapeError extends Error {}

function requireText(code: string, field: string, value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new CatalogShapeError(`variant ${code} has a non-text ${field}`);
  }
  return value;
}

export function categorize(productType: string, name: string, tags: unknown): MenuCategory {
  const haystacks = [productType.toLowerCase(), name.toLowerCase(), (JSON.stringify(tags) ?? '').toLowerCase()];
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some(keyword => haystacks.some(field => field.includes(keyword)))) {
      return category;
    }
  }
  return 'Other';
}

function push(catalog: CategorizedCatalog, category: MenuCategory, item: MenuItem): void {
  const bucket = catalog[category];
  if (bucket) bucket.push(item);
  else catalog[category] = [item];
}

function classifyVariants(menu: VendorMenu): CategorizedCatalog {
  const catalog: CategorizedCatalog = {};
  const variants = isRecord(menu.variants) ? menu.variants : {};

  for (const [code, item] of Object.entries(variants)) {
    if (!isRecord(item)) continue;

    const name = requireText(code, 'Name', item.Name);
    const productType = requireText(code, 'ProductType', item.ProductType);
    const category = categorize(productType, name, item.Tags ?? {});

    push(catalog, category, {
      code,
      name,
      price: text(item.Price),
      description: text(item.Description),
    });
  }

  if (isRecord(menu.coupons) && Object.keys(menu.coupons).length > 0) {
    const coupons: MenuItem[] = [];
    for (const [code, coupon] of Object.entries(menu.coupons)) {
      if (!isRecord(coupon)) continue;
      coupons.push({
        code,
        name: text(coupon.Name),
        price: text(coupon.Price),
        description: text(coupon.Description),
      });
    }
    catalog.Coupons = coupons;
  }

  return catalog;
}

// everything lands in Other, straight from the raw payload
function classifyRaw(menu: VendorMenu): CategorizedCatalog {
  const catalog: CategorizedCatalog = {};
  if (!isRecord(menu.data) || !isRecord(menu.data.Variants)) return catalog;

  for (const [code, item] of Object.entries(menu.data.Variants)) {
    if (!isRecord(item)) continue;
    push(catalog, 'Other', {
      code,
      name: text(item.Name, code),
      price: text(item.Price),
      description: '',
    });
  }
  return catalog;
}

/**
 * Sorts a vendor menu into Pizza, Wings, Pasta, Bread, Drinks, Desserts,
 * Coupons and Other by keyword. Category order follows the first item seen
 * in each. Never throws: a malformed variant list degrades to the structural
 * fallback, and a broken payload to an empty catalog.
 */
export function classifyCatalog(menu: VendorMenu): CategorizedCatalog {
  try {
    return classifyVariants(menu);
  } catch (error) {
    log.warn({ error: errorMessage(error) }, 'Menu variants are malformed, using raw fallback');
  }

  try {
    return classifyRaw(menu);
  } catch (error) {
    log.warn({ error: errorMessage(error) }, 'Raw menu fallback failed');
    return {};
  }
}
