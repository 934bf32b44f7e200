import { randomUUID } from "crypto";
import { z } from "zod";
import { CustomerNotFoundError } from "../common/errors";
import { CustomerRepository } from "./customer.repository";
import { CustomerUpdateSchema } from "./customer.schemas";
import { Customer, CustomerRequest } from "./customer.types";

export type CustomerUpdate = z.infer<typeof CustomerUpdateSchema>;

const isPresent = (value: string | undefined): value is string =>
  value !== undefined && value.trim() !== "";

export class CustomerService {
  constructor(
    private readonly repository: CustomerRepository,
    private readonly generateId: () => string = randomUUID
  ) {}

  async createCustomer(request: CustomerRequest): Promise<string> {
    const customer = await this.repository.save({
      id: request.id ?? this.generateId(),
      firstname: request.firstname,
      lastname: request.lastname,
      email: request.email,
      address: request.address ?? null,
    });
    console.log(`Customer ${customer.id} created.`);
    return customer.id;
  }

  /** Overwrites only the fields the update carries a non-blank value for. */
  async updateCustomer(update: CustomerUpdate): Promise<void> {
    const customer = await this.repository.findById(update.id);
    if (!customer) {
      throw new CustomerNotFoundError(update.id, "update");
    }

    await this.repository.save({
      ...customer,
      firstname: isPresent(update.firstname)
        ? update.firstname
        : customer.firstname,
      lastname: isPresent(update.lastname) ? update.lastname : customer.lastname,
      email: isPresent(update.email) ? update.email : customer.email,
      address: update.address ?? customer.address,
    });
    console.log(`Customer ${customer.id} updated.`);
  }

  findAllCustomers(): Promise<Customer[]> {
    return this.repository.findAll();
  }

  existsById(id: string): Promise<boolean> {
    return this.repository.existsById(id);
  }

  async findById(id: string): Promise<Customer> {
    const customer = await this.repository.findById(id);
    if (!customer) {
      throw new CustomerNotFoundError(id);
    }
    return customer;
  }

  async deleteCustomer(id: string): Promise<void> {
    await this.repository.deleteById(id);
    console.log(`Customer ${id} deleted.`);
  }
}
