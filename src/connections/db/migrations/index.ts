import { MigrationInfo } from './types';

import * as migration001 from './20250811_000001_create_products_table';
import * as migration002 from './20250811_000002_add_img_url_to_products';
import * as migration003 from './20250815_000001_create_categories_table';
import * as migration004 from './20250819_000001_create_cart_lines_table';
import * as migration005 from './20250905_000001_unique_cart_line_per_product';

export const migrations: MigrationInfo[] = [
  { name: '20250811_000001_create_products_table', migration: migration001.migration },
  { name: '20250811_000002_add_img_url_to_products', migration: migration002.migration },
  { name: '20250815_000001_create_categories_table', migration: migration003.migration },
  { name: '20250819_000001_create_cart_lines_table', migration: migration004.migration },
  { name: '20250905_000001_unique_cart_line_per_product', migration: migration005.migration },
];
