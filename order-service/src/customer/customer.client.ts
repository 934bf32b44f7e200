import { AxiosInstance } from "axios";
import { z } from "zod";
import { RemoteCallError } from "../common/errors";
import { toRemoteFailure } from "../common/remote";

const AddressSchema = z.object({
  street: z.string(),
  houseNumber: z.string(),
  zipCode: z.string(),
});

export const CustomerSchema = z.object({
  id: z.string(),
  firstname: z.string(),
  lastname: z.string(),
  email: z.string(),
  address: AddressSchema.nullable().default(null),
});

/** Customer details as returned by customer-service. */
export type Customer = z.infer<typeof CustomerSchema>;

export interface CustomerClient {
  /** Resolves null when the customer does not exist. */
  findCustomerById(customerId: string): Promise<Customer | null>;
}

export class HttpCustomerClient implements CustomerClient {
  constructor(private readonly http: AxiosInstance) {}

  async findCustomerById(customerId: string): Promise<Customer | null> {
    let data: unknown;
    try {
      ({ data } = await this.http.get<unknown>(
        `/${encodeURIComponent(customerId)}`
      ));
    } catch (error) {
      const failure = toRemoteFailure(error);
      if (failure.body?.error === "CUSTOMER_NOT_FOUND") {
        return null;
      }
      throw new RemoteCallError("customer-service", failure.reason);
    }

    const parsed = CustomerSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteCallError(
        "customer-service",
        "unexpected customer payload"
      );
    }
    return parsed.data;
  }
}
