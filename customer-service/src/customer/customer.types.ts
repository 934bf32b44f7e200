export interface Address {
  street: string;
  houseNumber: string;
  zipCode: string;
}

export interface Customer {
  id: string;
  firstname: string;
  lastname: string;
  email: string;
  address: Address | null;
}

export type CustomerRequest = Omit<Customer, "id" | "address"> & {
  id?: string;
  address?: Address | null;
};
