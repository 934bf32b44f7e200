import { z } from "zod";

export const AddressSchema = z.object({
  street: z.string().trim().min(1, "Street is required"),
  houseNumber: z.string().trim().min(1, "House number is required"),
  zipCode: z.string().trim().min(1, "Zip code is required"),
});

export const CustomerRequestSchema = z.object({
  id: z.string().trim().min(1).optional(),
  firstname: z.string().trim().min(1, "Customer firstname is required"),
  lastname: z.string().trim().min(1, "Customer lastname is required"),
  email: z
    .string()
    .trim()
    .min(1, "Customer email is required")
    .email("Customer email is not a valid email address"),
  address: AddressSchema.nullish(),
});

export const CustomerUpdateSchema = CustomerRequestSchema.extend({
  id: z.string().trim().min(1, "Customer id is required"),
  firstname: z.string().trim().optional(),
  lastname: z.string().trim().optional(),
  email: z
    .string()
    .trim()
    .email("Customer email is not a valid email address")
    .optional(),
});
