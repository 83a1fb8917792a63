import { Queryable } from '../connections/db/transaction';
import { CartService } from '../modules/cart/cart.service';
import { CategoryRepository } from '../modules/categories/categories.repository';
import { ProductRepository } from '../modules/products/products.repository';

/**
 * Everything the HTTP layer needs, built once at startup and passed in.
 */
export interface AppDependencies {
  db: Queryable;
  products: ProductRepository;
  categories: CategoryRepository;
  cartService: CartService;
}
