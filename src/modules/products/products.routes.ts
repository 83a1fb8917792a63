import express from 'express';
import { createProductsController } from './products.controller';
import { ProductRepository } from './products.repository';

export const createProductsRoutes = (products: ProductRepository) => {
  const router = express.Router();
  const productsController = createProductsController(products);

  router.post('/', productsController.createProduct);
  router.get('/', productsController.getProducts);
  router.get('/:product_id', productsController.getProductById);
  router.put('/:product_id', productsController.updateProduct);
  router.delete('/:product_id', productsController.deleteProduct);

  return router;
};
