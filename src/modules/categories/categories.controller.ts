import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { CategoryRepository } from './categories.repository';
import { categoryParamsSchema, categorySchema } from './categories.validation';

export const createCategoriesController = (categories: CategoryRepository) => ({
  // POST /categories
  addCategory: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = categorySchema.parse(req.body);

      if (await categories.findByName(name)) {
        return ResponseHandler.conflict(res, 'Category with this name already exists');
      }

      const category = await categories.create({ name }, new Date());
      logger.info('Category created', { categoryId: category.id, name });

      return ResponseHandler.created(res, [category], 'Category created successfully');
    } catch (error) {
      next(error);
    }
  },

  // GET /categories
  getCategories: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await categories.findAll();
      if (items.length === 0) {
        return ResponseHandler.notFound(res, 'No categories found');
      }
      return ResponseHandler.success(res, items, 'Categories fetched successfully');
    } catch (error) {
      next(error);
    }
  },

  // DELETE /categories/:category_id
  deleteCategory: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { category_id } = categoryParamsSchema.parse(req.params);
      if (!(await categories.delete(category_id))) {
        return ResponseHandler.notFound(res, 'Category not found');
      }
      return ResponseHandler.success(res, null, 'Category deleted successfully');
    } catch (error) {
      next(error);
    }
  },
});
