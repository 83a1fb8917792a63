import express from 'express';
import { createCategoriesController } from './categories.controller';
import { CategoryRepository } from './categories.repository';

export const createCategoriesRoutes = (categories: CategoryRepository) => {
  const router = express.Router();
  const categoriesController = createCategoriesController(categories);

  router.post('/', categoriesController.addCategory);
  router.get('/', categoriesController.getCategories);
  router.delete('/:category_id', categoriesController.deleteCategory);

  return router;
};
