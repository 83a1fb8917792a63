import { z } from 'zod';
import { MAX_LINE_QTY } from '../../connections/db/models/cart-line.model';

export const userIdSchema = z.string().trim().min(1, 'user_id is required').max(255);

export const productIdSchema = z.string().uuid('Invalid product_id format.');

// Positivity is the cart service's call; the schema only checks the shape
const quantitySchema = z
  .number({ invalid_type_error: 'total_qty must be a number' })
  .int('total_qty must be an integer')
  .max(MAX_LINE_QTY, `total_qty must not exceed ${MAX_LINE_QTY}`);

export const addToCartSchema = z.object({
  user_id: userIdSchema,
  product_id: productIdSchema,
  total_qty: quantitySchema,
});

export const updateCartQuantitySchema = z.object({
  total_qty: quantitySchema,
});

export const cartUserParamsSchema = z.object({
  user_id: userIdSchema,
});

export const cartItemParamsSchema = z.object({
  user_id: userIdSchema,
  product_id: productIdSchema,
});
