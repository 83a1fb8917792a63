import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../../connections/db/transaction';
import { Category, CreateCategoryInput } from '../../connections/db/models/category.model';

export interface CategoryRepository {
  findByName(name: string): Promise<Category | null>;
  findAll(): Promise<Category[]>;
  create(input: CreateCategoryInput, now: Date): Promise<Category>;
  delete(categoryId: string): Promise<boolean>;
}

export class PgCategoryRepository implements CategoryRepository {
  constructor(private readonly db: Queryable) {}

  async findByName(name: string): Promise<Category | null> {
    const result = await this.db.query<Category>(
      'SELECT id, name, created_at, updated_at FROM categories WHERE name = $1',
      [name]
    );
    return result.rows[0] ?? null;
  }

  async findAll(): Promise<Category[]> {
    const result = await this.db.query<Category>(
      'SELECT id, name, created_at, updated_at FROM categories ORDER BY created_at DESC'
    );
    return result.rows;
  }

  async create(input: CreateCategoryInput, now: Date): Promise<Category> {
    const result = await this.db.query<Category>(
      `INSERT INTO categories (id, name, created_at, updated_at)
       VALUES ($1, $2, $3, $3)
       RETURNING id, name, created_at, updated_at`,
      [uuidv4(), input.name, now]
    );
    return result.rows[0];
  }

  async delete(categoryId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM categories WHERE id = $1', [categoryId]);
    return (result.rowCount ?? 0) > 0;
  }
}
