// Product Model - mirrors the products table

export interface Product {
  id: string; // UUID
  product_name: string; // unique, trimmed
  description: string;
  price: string; // NUMERIC(10, 2), kept as a decimal string
  category: string;
  img_url: string | null;
  is_available: boolean; // default: true
  created_at: Date;
  updated_at: Date;
}

export interface CreateProductInput {
  product_name: string;
  description: string;
  price: string;
  category: string;
  img_url?: string | null;
  is_available?: boolean; // default: true
}

export type UpdateProductInput = CreateProductInput;
