import { Database } from "../db";
import { AddressSchema } from "./customer.schemas";
import { Customer } from "./customer.types";

export interface CustomerRepository {
  /** Inserts the customer or replaces the one stored under the same id. */
  save(customer: Customer): Promise<Customer>;
  findById(id: string): Promise<Customer | null>;
  findAll(): Promise<Customer[]>;
  existsById(id: string): Promise<boolean>;
  deleteById(id: string): Promise<void>;
}

interface CustomerRow {
  id: string;
  firstname: string;
  lastname: string;
  email: string;
  address: unknown;
}

const COLUMNS = "id, firstname, lastname, email, address";

const toCustomer = (row: CustomerRow): Customer => ({
  id: row.id,
  firstname: row.firstname,
  lastname: row.lastname,
  email: row.email,
  address: AddressSchema.nullable().parse(row.address),
});

export class PgCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Database) {}

  async save(customer: Customer): Promise<Customer> {
    const result = await this.db.query<CustomerRow>(
      `INSERT INTO customers (id, firstname, lastname, email, address)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (id) DO UPDATE SET
         firstname = EXCLUDED.firstname,
         lastname = EXCLUDED.lastname,
         email = EXCLUDED.email,
         address = EXCLUDED.address
       RETURNING ${COLUMNS}`,
      [
        customer.id,
        customer.firstname,
        customer.lastname,
        customer.email,
        customer.address ? JSON.stringify(customer.address) : null,
      ]
    );
    return toCustomer(result.rows[0]);
  }

  async findById(id: string): Promise<Customer | null> {
    const result = await this.db.query<CustomerRow>(
      `SELECT ${COLUMNS} FROM customers WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toCustomer(result.rows[0]) : null;
  }

  async findAll(): Promise<Customer[]> {
    const result = await this.db.query<CustomerRow>(
      `SELECT ${COLUMNS} FROM customers ORDER BY lastname, firstname`
    );
    return result.rows.map(toCustomer);
  }

  async existsById(id: string): Promise<boolean> {
    const result = await this.db.query(
      "SELECT 1 FROM customers WHERE id = $1",
      [id]
    );
    return result.rows.length > 0;
  }

  async deleteById(id: string): Promise<void> {
    await this.db.query("DELETE FROM customers WHERE id = $1", [id]);
  }
}
