import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../../connections/db/transaction';
import { CreateProductInput, Product, UpdateProductInput } from '../../connections/db/models/product.model';

/**
 * The only thing the cart needs to know about products.
 */
export interface ProductExistenceChecker {
  exists(productId: string): Promise<boolean>;
}

export interface ProductRepository extends ProductExistenceChecker {
  findById(productId: string): Promise<Product | null>;
  findByName(productName: string): Promise<Product | null>;
  findAll(): Promise<Product[]>;
  create(input: CreateProductInput, now: Date): Promise<Product>;
  update(productId: string, input: UpdateProductInput, now: Date): Promise<Product | null>;
  delete(productId: string): Promise<boolean>;
}

const PRODUCT_COLUMNS =
  'id, product_name, description, price, category, img_url, is_available, created_at, updated_at';

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async exists(productId: string): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM products WHERE id = $1', [productId]);
    return result.rows.length > 0;
  }

  async findById(productId: string): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
      [productId]
    );
    return result.rows[0] ?? null;
  }

  async findByName(productName: string): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE product_name = $1`,
      [productName]
    );
    return result.rows[0] ?? null;
  }

  async findAll(): Promise<Product[]> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY created_at DESC`
    );
    return result.rows;
  }

  async create(input: CreateProductInput, now: Date): Promise<Product> {
    const result = await this.db.query<Product>(
      `INSERT INTO products (id, product_name, description, price, category, img_url, is_available, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        uuidv4(),
        input.product_name,
        input.description,
        input.price,
        input.category,
        input.img_url ?? null,
        input.is_available ?? true,
        now,
      ]
    );
    return result.rows[0];
  }

  async update(productId: string, input: UpdateProductInput, now: Date): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `UPDATE products
       SET product_name = $2, description = $3, price = $4, category = $5,
           img_url = $6, is_available = $7, updated_at = $8
       WHERE id = $1
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        productId,
        input.product_name,
        input.description,
        input.price,
        input.category,
        input.img_url ?? null,
        input.is_available ?? true,
        now,
      ]
    );
    return result.rows[0] ?? null;
  }

  async delete(productId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM products WHERE id = $1', [productId]);
    return (result.rowCount ?? 0) > 0;
  }
}
