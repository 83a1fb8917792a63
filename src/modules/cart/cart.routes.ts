import express from 'express';
import { createCartController } from './cart.controller';
import { CartService } from './cart.service';

export const createCartRoutes = (cartService: CartService) => {
  const router = express.Router();
  const cartController = createCartController(cartService);

  router.post('/', cartController.addToCart);
  router.get('/:user_id', cartController.getCart);
  router.get('/:user_id/lines', cartController.getCartLines);
  router.put('/:user_id/:product_id', cartController.updateCartQuantity);
  router.delete('/:user_id/:product_id', cartController.removeCartItem);
  router.delete('/:user_id', cartController.clearCart);

  return router;
};
