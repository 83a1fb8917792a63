import { Product } from '../../src/connections/db/models/product.model';

export const LIP_BALM_ID = '3f2b8c1e-5d4a-4c6b-9e7f-1a2b3c4d5e6f';
export const HAND_CREAM_ID = 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d';
export const MISSING_PRODUCT_ID = 'b7e4f1a2-3c5d-4e6f-a7b8-c9d0e1f2a3b4';

export const makeProduct = (overrides: Partial<Product> = {}): Product => ({
  id: LIP_BALM_ID,
  product_name: 'lip balm',
  description: 'Unscented lip balm',
  price: '9.99',
  category: 'skin care',
  img_url: 'https://cdn.example.com/lip-balm.png',
  is_available: true,
  created_at: new Date('2025-08-11T08:00:00Z'),
  updated_at: new Date('2025-08-11T08:00:00Z'),
  ...overrides,
});

export const defaultProducts = (): Product[] => [
  makeProduct(),
  makeProduct({
    id: HAND_CREAM_ID,
    product_name: 'hand cream',
    description: 'Shea butter hand cream',
    price: '12.50',
    img_url: null,
    created_at: new Date('2025-08-12T08:00:00Z'),
    updated_at: new Date('2025-08-12T08:00:00Z'),
  }),
];
