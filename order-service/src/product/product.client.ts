import { AxiosInstance } from "axios";
import { z } from "zod";
import {
  InsufficientStockError,
  ProductsNotFoundError,
  RemoteCallError,
} from "../common/errors";
import { toRemoteFailure } from "../common/remote";

export interface PurchaseRequest {
  productId: number;
  quantity: number;
}

const PurchaseResultSchema = z.object({
  productId: z.number(),
  name: z.string(),
  description: z.string(),
  price: z.number(),
  quantity: z.number(),
});

export type PurchaseResult = z.infer<typeof PurchaseResultSchema>;

export interface ProductClient {
  /** Reserves stock for the whole batch or fails without reserving any. */
  purchaseProducts(requests: PurchaseRequest[]): Promise<PurchaseResult[]>;
  /** Gives back stock taken by an earlier purchase. */
  releaseProducts(requests: PurchaseRequest[]): Promise<void>;
}

export class HttpProductClient implements ProductClient {
  constructor(private readonly http: AxiosInstance) {}

  async purchaseProducts(
    requests: PurchaseRequest[]
  ): Promise<PurchaseResult[]> {
    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>("/purchase", requests));
    } catch (error) {
      const failure = toRemoteFailure(error);

      if (failure.body?.error === "PRODUCTS_NOT_FOUND") {
        throw new ProductsNotFoundError();
      }
      if (
        failure.body?.error === "INSUFFICIENT_STOCK" &&
        failure.body.productId !== undefined
      ) {
        throw new InsufficientStockError(failure.body.productId);
      }
      throw new RemoteCallError(
        "product-service",
        `An error occurred while processing the products purchase: ${failure.reason}`
      );
    }

    const parsed = z.array(PurchaseResultSchema).safeParse(data);
    if (!parsed.success) {
      throw new RemoteCallError("product-service", "unexpected purchase payload");
    }
    return parsed.data;
  }

  async releaseProducts(requests: PurchaseRequest[]): Promise<void> {
    try {
      await this.http.post("/release", requests);
    } catch (error) {
      throw new RemoteCallError(
        "product-service",
        `Releasing reserved products failed: ${toRemoteFailure(error).reason}`
      );
    }
  }
}
