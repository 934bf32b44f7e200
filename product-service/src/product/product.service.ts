import {
  CategoryNotFoundError,
  InsufficientStockError,
  ProductNotFoundError,
  ProductsNotFoundError,
} from "../common/errors";
import { ProductRepository } from "./product.repository";
import {
  Category,
  NewCategory,
  NewProduct,
  Product,
  ProductResponse,
  PurchaseRequest,
  PurchaseResult,
} from "./product.types";

export const toProductResponse = (product: Product): ProductResponse => ({
  id: product.id,
  name: product.name,
  description: product.description,
  availableQuantity: product.availableQuantity,
  price: product.price,
  categoryId: product.category.id,
  categoryName: product.category.name,
  categoryDescription: product.category.description,
});

/**
 * Sums the quantities requested for the same product and sorts the batch by
 * product id, the order in which the products are fetched and locked.
 */
export function aggregateByProduct(
  requests: PurchaseRequest[]
): PurchaseRequest[] {
  const totals = new Map<number, number>();
  for (const { productId, quantity } of requests) {
    totals.set(productId, (totals.get(productId) ?? 0) + quantity);
  }

  return [...totals.entries()]
    .map(([productId, quantity]) => ({ productId, quantity }))
    .sort((a, b) => a.productId - b.productId);
}

export class ProductService {
  constructor(private readonly repository: ProductRepository) {}

  async createCategory(request: NewCategory): Promise<Category> {
    const category = await this.repository.createCategory(request);
    console.log(`Category ${category.id} (${category.name}) created.`);
    return category;
  }

  findAllCategories(): Promise<Category[]> {
    return this.repository.findAllCategories();
  }

  async createProduct(request: NewProduct): Promise<number> {
    const category = await this.repository.findCategoryById(request.categoryId);
    if (!category) {
      throw new CategoryNotFoundError(request.categoryId);
    }

    const product = await this.repository.create(request);
    console.log(
      `Product ${product.id} created with ${product.availableQuantity} units in stock.`
    );
    return product.id;
  }

  async findById(id: number): Promise<ProductResponse> {
    const product = await this.repository.findById(id);
    if (!product) {
      throw new ProductNotFoundError(id);
    }
    return toProductResponse(product);
  }

  async findAll(): Promise<ProductResponse[]> {
    const products = await this.repository.findAll();
    return products.map(toProductResponse);
  }

  /**
   * Takes stock for every product of the batch, or for none of them.
   *
   * Products are checked in id order; the first one short of stock fails the
   * whole batch with {@link InsufficientStockError} and every decrement made
   * so far is rolled back with the transaction. A product may be bought down
   * to exactly zero.
   */
  async purchaseProducts(
    requests: PurchaseRequest[]
  ): Promise<PurchaseResult[]> {
    const sortedRequests = aggregateByProduct(requests);
    const productIds = sortedRequests.map((request) => request.productId);

    const purchasedProducts = await this.repository.inTransaction(
      async (tx) => {
        const storedProducts = await tx.findAllByIdInOrderById(productIds);

        if (storedProducts.length !== productIds.length) {
          throw new ProductsNotFoundError();
        }

        const purchased: PurchaseResult[] = [];

        for (const [index, product] of storedProducts.entries()) {
          const request = sortedRequests[index];

          if (product.availableQuantity < request.quantity) {
            throw new InsufficientStockError(request.productId);
          }

          await tx.updateAvailableQuantity(
            product.id,
            product.availableQuantity - request.quantity
          );

          purchased.push({
            productId: product.id,
            name: product.name,
            description: product.description,
            price: product.price,
            quantity: request.quantity,
          });
        }

        return purchased;
      }
    );

    console.log(
      `Reserved stock for products [${productIds.join(", ")}].`
    );
    return purchasedProducts;
  }

  /** Puts back stock taken by an earlier {@link purchaseProducts} call. */
  async releaseProducts(requests: PurchaseRequest[]): Promise<void> {
    const sortedRequests = aggregateByProduct(requests);
    const productIds = sortedRequests.map((request) => request.productId);

    await this.repository.inTransaction(async (tx) => {
      const storedProducts = await tx.findAllByIdInOrderById(productIds);

      if (storedProducts.length !== productIds.length) {
        throw new ProductsNotFoundError();
      }

      for (const [index, product] of storedProducts.entries()) {
        await tx.updateAvailableQuantity(
          product.id,
          product.availableQuantity + sortedRequests[index].quantity
        );
      }
    });

    console.log(`Released stock for products [${productIds.join(", ")}].`);
  }
}
