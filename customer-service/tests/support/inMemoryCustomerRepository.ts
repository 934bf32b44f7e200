import { CustomerRepository } from "../../src/customer/customer.repository";
import { Customer } from "../../src/customer/customer.types";

const copy = (customer: Customer): Customer => ({
  ...customer,
  address: customer.address ? { ...customer.address } : null,
});

export class InMemoryCustomerRepository implements CustomerRepository {
  private customers = new Map<string, Customer>();

  async save(customer: Customer): Promise<Customer> {
    this.customers.set(customer.id, copy(customer));
    return copy(customer);
  }

  async findById(id: string): Promise<Customer | null> {
    const customer = this.customers.get(id);
    return customer ? copy(customer) : null;
  }

  async findAll(): Promise<Customer[]> {
    return [...this.customers.values()].map(copy);
  }

  async existsById(id: string): Promise<boolean> {
    return this.customers.has(id);
  }

  async deleteById(id: string): Promise<void> {
    this.customers.delete(id);
  }
}
