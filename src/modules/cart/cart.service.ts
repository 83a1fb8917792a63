import { validate as isUuid } from 'uuid';
import { CartLine, AggregatedCartView, MAX_LINE_QTY } from '../../connections/db/models/cart-line.model';
import { AppError, InvalidArgumentError, NotFoundError, errorMessage, toStorageError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import { ProductExistenceChecker } from '../products/products.repository';
import { CartAggregator } from './cart.aggregator';
import { CartRepository, CartUnitOfWork } from './cart.repository';

export interface CartServiceDependencies {
  unitOfWork: CartUnitOfWork;
  carts: CartRepository;
  aggregator: CartAggregator;
  products: ProductExistenceChecker;
}

export interface AddToCartResult {
  line: CartLine;
  /** false when the quantity was merged into an existing line */
  created: boolean;
}

const assertUserId = (userId: string): void => {
  if (userId.trim().length === 0) {
    throw new InvalidArgumentError('user_id must not be empty');
  }
};

const assertProductId = (productId: string): void => {
  if (!isUuid(productId)) {
    throw new InvalidArgumentError(`Invalid product_id format: ${productId}`);
  }
};

const assertPositiveQuantity = (qty: number): void => {
  if (!Number.isInteger(qty) || qty <= 0) {
    throw new InvalidArgumentError('Quantity must be greater than 0.');
  }
  if (qty > MAX_LINE_QTY) {
    throw new InvalidArgumentError(`Quantity must not exceed ${MAX_LINE_QTY}.`);
  }
};

const missingLine = (userId: string, productId: string): NotFoundError =>
  new NotFoundError(`No cart item found for user '${userId}' with product_id '${productId}'.`);

/**
 * CartService
 *
 * Cart operations on top of the cart repository:
 * - add to cart merges additively into the existing line for the pair
 * - update quantity overwrites it
 * - reads go through the aggregated, per-product view
 *
 * Read-modify-write paths run in one transaction with the line locked, so
 * concurrent adds for the same user and product neither duplicate rows nor
 * lose increments. Store failures surface as StorageError (or ConflictError
 * for unique violations); nothing is retried here.
 */
export class CartService {
  private readonly log = getLogger('CartService');

  constructor(private readonly deps: CartServiceDependencies) {}

  /**
   * Adds `qty` of a product to the user's cart.
   *
   * @throws InvalidArgumentError if qty is not a positive integer or an id is malformed
   * @throws NotFoundError if the product does not exist
   */
  async addToCart(userId: string, productId: string, qty: number, now: Date = new Date()): Promise<AddToCartResult> {
    assertUserId(userId);
    assertProductId(productId);
    assertPositiveQuantity(qty);
    await this.ensureProductExists(productId);

    try {
      const result = await this.deps.unitOfWork.run(async (carts): Promise<AddToCartResult> => {
        const existing = await carts.findByUserAndProduct(userId, productId, { forUpdate: true });

        if (existing) {
          const newQty = existing.total_qty + qty;
          if (newQty > MAX_LINE_QTY) {
            throw new InvalidArgumentError(
              `Cart quantity would exceed ${MAX_LINE_QTY} (currently ${existing.total_qty}).`
            );
          }
          const line = await carts.updateQuantity(existing, newQty, now);
          return { line, created: false };
        }

        // A concurrent add can still win the insert; the store then merges
        const { line, inserted } = await carts.insert(userId, productId, qty, now);
        return { line, created: inserted };
      });

      this.log.info(result.created ? 'Created cart line' : 'Merged quantity into existing cart line', {
        lineId: result.line.id,
        userId,
        productId,
        added: qty,
        totalQty: result.line.total_qty,
      });

      return result;
    } catch (error) {
      throw this.fail('adding item to cart', error, { userId, productId, qty });
    }
  }

  /**
   * Sets the quantity of an existing cart line (overwrite, not add).
   *
   * @throws InvalidArgumentError if newQty is not a positive integer or an id is malformed
   * @throws NotFoundError if the product or the cart line does not exist
   */
  async updateCartQuantity(userId: string, productId: string, newQty: number, now: Date = new Date()): Promise<CartLine> {
    assertUserId(userId);
    assertProductId(productId);
    assertPositiveQuantity(newQty);
    await this.ensureProductExists(productId);

    try {
      const line = await this.deps.unitOfWork.run(async (carts) => {
        const existing = await carts.findByUserAndProduct(userId, productId, { forUpdate: true });
        if (!existing) {
          throw missingLine(userId, productId);
        }
        return carts.updateQuantity(existing, newQty, now);
      });

      this.log.info('Updated cart line quantity', { lineId: line.id, userId, productId, totalQty: newQty });

      return line;
    } catch (error) {
      throw this.fail('updating cart quantity', error, { userId, productId, newQty });
    }
  }

  /**
   * Aggregated per-product view of the user's cart, ordered by product id.
   *
   * @throws NotFoundError if the user has no cart lines
   */
  async getCartForUser(userId: string): Promise<AggregatedCartView[]> {
    assertUserId(userId);

    try {
      if (!(await this.deps.carts.existsForUser(userId))) {
        throw new NotFoundError('Carts not found.');
      }

      const views = await this.deps.aggregator.aggregateForUser(userId);

      // Lines whose product has since been deleted drop out of the join
      if (views.length === 0) {
        throw new NotFoundError('No carts found for this user.');
      }

      return views;
    } catch (error) {
      throw this.fail('fetching cart', error, { userId });
    }
  }

  /**
   * Raw, unaggregated lines for a user. Empty when the user has none.
   */
  async listCartLines(userId: string): Promise<CartLine[]> {
    assertUserId(userId);

    try {
      return await this.deps.carts.findAllForUser(userId);
    } catch (error) {
      throw this.fail('listing cart lines', error, { userId });
    }
  }

  /**
   * @throws NotFoundError if the user has no line for the product
   */
  async removeCartItem(userId: string, productId: string): Promise<void> {
    assertUserId(userId);
    assertProductId(productId);

    try {
      const line = await this.deps.carts.findByUserAndProduct(userId, productId);
      if (!line || !(await this.deps.carts.delete(line))) {
        throw missingLine(userId, productId);
      }

      this.log.info('Removed cart line', { lineId: line.id, userId, productId });
    } catch (error) {
      throw this.fail('removing cart item', error, { userId, productId });
    }
  }

  /**
   * Deletes every line of the user's cart and returns how many were removed.
   *
   * @throws NotFoundError if the user had no lines
   */
  async clearCart(userId: string): Promise<number> {
    assertUserId(userId);

    try {
      const deletedCount = await this.deps.carts.deleteAllForUser(userId);
      if (deletedCount === 0) {
        throw new NotFoundError(`No cart item found for user '${userId}'.`);
      }

      this.log.info('Cleared cart', { userId, deletedCount });

      return deletedCount;
    } catch (error) {
      throw this.fail('clearing cart', error, { userId });
    }
  }

  private async ensureProductExists(productId: string): Promise<void> {
    let exists: boolean;
    try {
      exists = await this.deps.products.exists(productId);
    } catch (error) {
      throw this.fail('checking product', error, { productId });
    }

    if (!exists) {
      throw new NotFoundError('No product found with this ID.');
    }
  }

  private fail(action: string, error: unknown, context: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      return error;
    }

    this.log.error(`Error ${action}`, { error: errorMessage(error), ...context });
    return toStorageError(error);
  }
}
