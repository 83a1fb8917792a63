import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { CartService } from './cart.service';
import {
  addToCartSchema,
  cartItemParamsSchema,
  cartUserParamsSchema,
  updateCartQuantitySchema,
} from './cart.validation';

export const createCartController = (cartService: CartService) => ({
  // POST /carts
  addToCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id, product_id, total_qty } = addToCartSchema.parse(req.body);
      const { line, created } = await cartService.addToCart(user_id, product_id, total_qty);

      if (created) {
        return ResponseHandler.created(res, [line], 'The product was successfully added to the cart.');
      }
      return ResponseHandler.success(res, [line], `Product quantity updated in cart. Added ${total_qty} items.`);
    } catch (error) {
      next(error);
    }
  },

  // GET /carts/:user_id
  getCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id } = cartUserParamsSchema.parse(req.params);
      const items = await cartService.getCartForUser(user_id);
      return ResponseHandler.success(res, items, 'Carts fetched successfully.');
    } catch (error) {
      next(error);
    }
  },

  // GET /carts/:user_id/lines
  getCartLines: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id } = cartUserParamsSchema.parse(req.params);
      const lines = await cartService.listCartLines(user_id);
      return ResponseHandler.success(res, lines, 'Cart lines fetched successfully.');
    } catch (error) {
      next(error);
    }
  },

  // PUT /carts/:user_id/:product_id
  updateCartQuantity: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id, product_id } = cartItemParamsSchema.parse(req.params);
      const { total_qty } = updateCartQuantitySchema.parse(req.body);
      const line = await cartService.updateCartQuantity(user_id, product_id, total_qty);
      return ResponseHandler.success(res, line, 'Cart quantity updated successfully.');
    } catch (error) {
      next(error);
    }
  },

  // DELETE /carts/:user_id/:product_id
  removeCartItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id, product_id } = cartItemParamsSchema.parse(req.params);
      await cartService.removeCartItem(user_id, product_id);
      return ResponseHandler.success(
        res,
        null,
        `Cart item successfully deleted for user '${user_id}' and product '${product_id}'.`
      );
    } catch (error) {
      next(error);
    }
  },

  // DELETE /carts/:user_id
  clearCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id } = cartUserParamsSchema.parse(req.params);
      const deletedCount = await cartService.clearCart(user_id);
      return ResponseHandler.success(
        res,
        { deleted_count: deletedCount },
        `Cart items successfully deleted for user '${user_id}'.`
      );
    } catch (error) {
      next(error);
    }
  },
});
