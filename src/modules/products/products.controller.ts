import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { ProductRepository } from './products.repository';
import { productParamsSchema, productSchema } from './products.validation';

export const createProductsController = (products: ProductRepository) => ({
  // POST /products
  createProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = productSchema.parse(req.body);

      if (await products.findByName(input.product_name)) {
        return ResponseHandler.conflict(res, 'A product with this name already exists.');
      }

      const product = await products.create(input, new Date());
      logger.info('Product created', { productId: product.id, productName: product.product_name });

      return ResponseHandler.created(res, [product], 'Product created successfully.');
    } catch (error) {
      next(error);
    }
  },

  // GET /products
  getProducts: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await products.findAll();
      if (items.length === 0) {
        return ResponseHandler.notFound(res, 'No products found.');
      }
      return ResponseHandler.success(res, items, 'Products fetched successfully.');
    } catch (error) {
      next(error);
    }
  },

  // GET /products/:product_id
  getProductById: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { product_id } = productParamsSchema.parse(req.params);
      const product = await products.findById(product_id);
      if (!product) {
        return ResponseHandler.notFound(res, 'Product not found.');
      }
      return ResponseHandler.success(res, [product], 'Product fetched successfully.');
    } catch (error) {
      next(error);
    }
  },

  // PUT /products/:product_id
  updateProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { product_id } = productParamsSchema.parse(req.params);
      const input = productSchema.parse(req.body);

      const duplicate = await products.findByName(input.product_name);
      if (duplicate && duplicate.id !== product_id) {
        return ResponseHandler.conflict(res, 'A product with this name already exists.');
      }

      const product = await products.update(product_id, input, new Date());
      if (!product) {
        return ResponseHandler.notFound(res, 'Product not found.');
      }

      logger.info('Product updated', { productId: product.id });
      return ResponseHandler.success(res, [product], 'Product updated successfully.');
    } catch (error) {
      next(error);
    }
  },

  // DELETE /products/:product_id
  deleteProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { product_id } = productParamsSchema.parse(req.params);
      if (!(await products.delete(product_id))) {
        return ResponseHandler.notFound(res, 'Product not found or already deleted.');
      }

      logger.info('Product deleted', { productId: product_id });
      return ResponseHandler.success(res, null, 'Product deleted successfully.');
    } catch (error) {
      next(error);
    }
  },
});
