/**
 * FORECAST DATA: Product catalog
 *
 * Fixed enumeration of market products the backend forecasts.
 */

export const PRODUCTS = ['DALMP', 'RTLMP', 'RegUp', 'RegDown', 'RRS', 'NSRS'] as const;

export type ProductId = (typeof PRODUCTS)[number];

export type ProductCategory = 'energy' | 'ancillary';

export interface ProductDetails {
  displayName: string;
  description: string;
  unit: string;
  canBeNegative: boolean;
  category: ProductCategory;
}

export const PRODUCT_DETAILS: Record<ProductId, ProductDetails> = {
  DALMP: {
    displayName: 'Day-Ahead LMP',
    description: 'Day-Ahead Locational Marginal Price',
    unit: '$/MWh',
    canBeNegative: true,
    category: 'energy',
  },
  RTLMP: {
    displayName: 'Real-Time LMP',
    description: 'Real-Time Locational Marginal Price',
    unit: '$/MWh',
    canBeNegative: true,
    category: 'energy',
  },
  RegUp: {
    displayName: 'Regulation Up',
    description: 'Regulation Up Service',
    unit: '$/MW',
    canBeNegative: false,
    category: 'ancillary',
  },
  RegDown: {
    displayName: 'Regulation Down',
    description: 'Regulation Down Service',
    unit: '$/MW',
    canBeNegative: false,
    category: 'ancillary',
  },
  RRS: {
    displayName: 'Responsive Reserve',
    description: 'Responsive Reserve Service',
    unit: '$/MW',
    canBeNegative: false,
    category: 'ancillary',
  },
  NSRS: {
    displayName: 'Non-Spinning Reserve',
    description: 'Non-Spinning Reserve Service',
    unit: '$/MW',
    canBeNegative: false,
    category: 'ancillary',
  },
};

export const DEFAULT_PRODUCT: ProductId = 'DALMP';

const DEFAULT_UNIT = '$/MWh';

export function isValidProduct(product: string): product is ProductId {
  return PRODUCTS.some(known => known === product);
}

export function getProductUnit(product: string): string {
  return isValidProduct(product) ? PRODUCT_DETAILS[product].unit : DEFAULT_UNIT;
}

export interface ProductCatalogEntry extends ProductDetails {
  id: ProductId;
  isDefault: boolean;
}

/**
 * Catalog in display order, for the dashboard's product picker
 */
export function listProducts(): ProductCatalogEntry[] {
  return PRODUCTS.map(id => ({
    id,
    ...PRODUCT_DETAILS[id],
    isDefault: id === DEFAULT_PRODUCT,
  }));
}
