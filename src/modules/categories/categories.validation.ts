import { z } from 'zod';

export const categorySchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Category name is required')
    .max(255)
    .transform(name => name.toLowerCase()),
});

export const categoryParamsSchema = z.object({
  category_id: z.string().uuid('Invalid UUID format for category_id'),
});
