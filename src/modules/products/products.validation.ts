import { z } from 'zod';

// Money travels as a decimal string with at most two fractional digits
const priceSchema = z
  .union([z.number(), z.string()])
  .transform(value => String(value).trim())
  .refine(value => /^\d{1,8}(\.\d{1,2})?$/.test(value), {
    message: 'price must be a non-negative amount with at most 2 decimals',
  });

export const productSchema = z.object({
  product_name: z.string().trim().min(1, 'product_name is required').max(255),
  description: z.string().default(''),
  price: priceSchema,
  category: z.string().trim().max(255).default(''),
  img_url: z.string().url().max(500).nullable().optional(),
  is_available: z.boolean().default(true),
});

export const productParamsSchema = z.object({
  product_id: z.string().uuid('Invalid product_id format. Must be a valid UUID.'),
});
