export interface Category {
  id: number;
  name: string;
  description: string;
}

export interface Product {
  id: number;
  name: string;
  description: string;
  availableQuantity: number;
  price: number;
  category: Category;
}

export type NewCategory = Omit<Category, "id">;

export interface NewProduct {
  name: string;
  description: string;
  availableQuantity: number;
  price: number;
  categoryId: number;
}

export interface ProductResponse {
  id: number;
  name: string;
  description: string;
  availableQuantity: number;
  price: number;
  categoryId: number;
  categoryName: string;
  categoryDescription: string;
}

/** One entry of a reservation batch. */
export interface PurchaseRequest {
  productId: number;
  quantity: number;
}

/** Echoes the product as it was when the stock was taken. */
export interface PurchaseResult {
  productId: number;
  name: string;
  description: string;
  price: number;
  quantity: number;
}
