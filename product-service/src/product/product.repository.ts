import { PoolClient } from "pg";
import { Database } from "../db";
import { Category, NewCategory, NewProduct, Product } from "./product.types";

/** Product storage as seen from inside one transaction. */
export interface ProductTransaction {
  /**
   * Returns the products whose id is in `ids`, ordered by id. The rows stay
   * locked until the transaction ends.
   */
  findAllByIdInOrderById(ids: number[]): Promise<Product[]>;
  updateAvailableQuantity(id: number, availableQuantity: number): Promise<void>;
}

export interface ProductRepository {
  createCategory(category: NewCategory): Promise<Category>;
  findCategoryById(id: number): Promise<Category | null>;
  findAllCategories(): Promise<Category[]>;

  create(product: NewProduct): Promise<Product>;
  findById(id: number): Promise<Product | null>;
  findAll(): Promise<Product[]>;

  /** Commits when `work` resolves, rolls back when it rejects. */
  inTransaction<T>(work: (tx: ProductTransaction) => Promise<T>): Promise<T>;
}

interface CategoryRow {
  id: number;
  name: string;
  description: string;
}

interface ProductRow {
  id: number;
  name: string;
  description: string;
  available_quantity: number;
  price: string;
  category_id: number;
  category_name: string;
  category_description: string;
}

const SELECT_PRODUCTS = `
  SELECT p.id, p.name, p.description, p.available_quantity, p.price,
         c.id AS category_id, c.name AS category_name,
         c.description AS category_description
  FROM products p
  JOIN categories c ON c.id = p.category_id`;

const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  description: row.description,
  availableQuantity: row.available_quantity,
  // NUMERIC comes back from pg as a string
  price: Number(row.price),
  category: {
    id: row.category_id,
    name: row.category_name,
    description: row.category_description,
  },
});

class PgProductTransaction implements ProductTransaction {
  constructor(private readonly client: PoolClient) {}

  async findAllByIdInOrderById(ids: number[]): Promise<Product[]> {
    // Locking in id order keeps two overlapping batches from deadlocking.
    const result = await this.client.query<ProductRow>(
      `${SELECT_PRODUCTS} WHERE p.id = ANY($1::int[]) ORDER BY p.id FOR UPDATE OF p`,
      [ids]
    );
    return result.rows.map(toProduct);
  }

  async updateAvailableQuantity(id: number, availableQuantity: number) {
    await this.client.query(
      "UPDATE products SET available_quantity = $2 WHERE id = $1",
      [id, availableQuantity]
    );
  }
}

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Database) {}

  async createCategory(category: NewCategory): Promise<Category> {
    const result = await this.db.query<CategoryRow>(
      "INSERT INTO categories (name, description) VALUES ($1, $2) RETURNING id, name, description",
      [category.name, category.description]
    );
    return result.rows[0];
  }

  async findCategoryById(id: number): Promise<Category | null> {
    const result = await this.db.query<CategoryRow>(
      "SELECT id, name, description FROM categories WHERE id = $1",
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findAllCategories(): Promise<Category[]> {
    const result = await this.db.query<CategoryRow>(
      "SELECT id, name, description FROM categories ORDER BY id"
    );
    return result.rows;
  }

  async create(product: NewProduct): Promise<Product> {
    const inserted = await this.db.query<{ id: number }>(
      `INSERT INTO products (name, description, available_quantity, price, category_id)
       VALUES ($1, $2, $3, $4, $5) RETURNING id`,
      [
        product.name,
        product.description,
        product.availableQuantity,
        product.price,
        product.categoryId,
      ]
    );
    const created = await this.findById(inserted.rows[0].id);
    if (!created) {
      throw new Error(`Product ${inserted.rows[0].id} vanished after insert`);
    }
    return created;
  }

  async findById(id: number): Promise<Product | null> {
    const result = await this.db.query<ProductRow>(
      `${SELECT_PRODUCTS} WHERE p.id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async findAll(): Promise<Product[]> {
    const result = await this.db.query<ProductRow>(
      `${SELECT_PRODUCTS} ORDER BY p.id`
    );
    return result.rows.map(toProduct);
  }

  inTransaction<T>(work: (tx: ProductTransaction) => Promise<T>): Promise<T> {
    return this.db.withTransaction((client) =>
      work(new PgProductTransaction(client))
    );
  }
}
