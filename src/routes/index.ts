import express from 'express';
import { AppDependencies } from '../types/app.types';
import { createProductsRoutes } from '../modules/products/products.routes';
import { createCategoriesRoutes } from '../modules/categories/categories.routes';
import { createCartRoutes } from '../modules/cart/cart.routes';

export const createRoutes = (deps: AppDependencies) => {
  const router = express.Router();

  router.get('/healthz', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  router.use('/categories', createCategoriesRoutes(deps.categories));
  router.use('/products', createProductsRoutes(deps.products));
  router.use('/carts', createCartRoutes(deps.cartService));

  return router;
};
