import { AxiosInstance } from "axios";
import { z } from "zod";
import { PaymentFailedError } from "../common/errors";
import { toRemoteFailure } from "../common/remote";
import { Customer } from "../customer/customer.client";
import { PaymentMethod } from "../order/order.types";

export interface PaymentRequest {
  amount: number;
  paymentMethod: PaymentMethod;
  orderId: number;
  orderReference: string;
  customer: Customer;
}

const PaymentResponseSchema = z.object({ id: z.number().int() });

export interface PaymentClient {
  /** Resolves the payment's transaction id. */
  requestOrderPayment(request: PaymentRequest): Promise<number>;
}

export class HttpPaymentClient implements PaymentClient {
  constructor(private readonly http: AxiosInstance) {}

  async requestOrderPayment(request: PaymentRequest): Promise<number> {
    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>("", request));
    } catch (error) {
      throw new PaymentFailedError(
        request.orderReference,
        toRemoteFailure(error).reason
      );
    }

    const parsed = PaymentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PaymentFailedError(
        request.orderReference,
        "unexpected payment payload"
      );
    }
    return parsed.data.id;
  }
}
