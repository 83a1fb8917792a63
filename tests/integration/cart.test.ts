import request from 'supertest';
import { buildTestApp } from '../support/test-app';
import { HAND_CREAM_ID, LIP_BALM_ID, MISSING_PRODUCT_ID } from '../support/fixtures';

describe('Cart API', () => {
  let ctx: ReturnType<typeof buildTestApp>;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  const addToCart = (body: object) => request(ctx.app).post('/api/v1/carts').send(body);

  describe('POST /api/v1/carts', () => {
    it('creates a line, then merges further adds into it', async () => {
      const first = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 2 });

      expect(first.status).toBe(201);
      expect(first.body.success).toBe(true);
      expect(first.body.message).toBe('The product was successfully added to the cart.');
      expect(first.body.data[0].total_qty).toBe(2);

      const second = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 3 });

      expect(second.status).toBe(200);
      expect(second.body.message).toBe('Product quantity updated in cart. Added 3 items.');
      expect(second.body.data[0].id).toBe(first.body.data[0].id);
      expect(second.body.data[0].total_qty).toBe(5);
      expect(ctx.store.lines).toHaveLength(1);
    });

    it('rejects a non-positive quantity', async () => {
      const res = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 0 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        message: 'Quantity must be greater than 0.',
        error: { code: 'INVALID_ARGUMENT' },
      });
      expect(ctx.store.lines).toHaveLength(0);
    });

    it.each([
      ['a malformed product id', { user_id: 'u1', product_id: 'abc', total_qty: 1 }],
      ['a quantity sent as a string', { user_id: 'u1', product_id: LIP_BALM_ID, total_qty: '2' }],
      ['a missing user id', { product_id: LIP_BALM_ID, total_qty: 1 }],
    ])('rejects %s with a validation error', async (_label, body) => {
      const res = await addToCart(body);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid request data');
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a quantity above the column range with a validation error', async () => {
      const res = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 3_000_000_000 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details[0].message).toBe('total_qty must not exceed 2147483647');
      expect(ctx.store.lines).toHaveLength(0);
    });

    it('answers 400, not 503, when a merge would overflow the quantity', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 2_000_000_000 });

      const res = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 2_000_000_000 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_ARGUMENT');
    });

    it('returns 404 for an unknown product', async () => {
      const res = await addToCart({ user_id: 'u1', product_id: MISSING_PRODUCT_ID, total_qty: 1 });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('No product found with this ID.');
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(ctx.app)
        .post('/api/v1/carts')
        .set('Content-Type', 'application/json')
        .send('{"user_id":');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Malformed JSON body');
      expect(res.body.error.code).toBe('BAD_REQUEST');
    });

    it('answers 503 when the store fails', async () => {
      jest.spyOn(ctx.store, 'insert').mockRejectedValueOnce(new Error('connection refused'));

      const res = await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 1 });

      expect(res.status).toBe(503);
      expect(res.body.message).toBe('Storage failure: connection refused');
      expect(res.body.error.code).toBe('STORAGE_ERROR');
    });
  });

  describe('GET /api/v1/carts/:user_id', () => {
    it('returns one aggregated entry per product', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 2 });
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 3 });
      await addToCart({ user_id: 'u1', product_id: HAND_CREAM_ID, total_qty: 2 });

      const res = await request(ctx.app).get('/api/v1/carts/u1');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Carts fetched successfully.');
      expect(
        res.body.data.map((view: { product_id: string; total_qty: number; sub_total_price: string }) => [
          view.product_id,
          view.total_qty,
          view.sub_total_price,
        ])
      ).toEqual([
        [LIP_BALM_ID, 5, '49.95'],
        [HAND_CREAM_ID, 2, '25.00'],
      ]);
    });

    it('returns 404 for a user without lines', async () => {
      const res = await request(ctx.app).get('/api/v1/carts/nobody');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Carts not found.');
    });

    it('answers 503 when aggregation fails', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 1 });
      jest.spyOn(ctx.store, 'aggregateForUser').mockRejectedValueOnce(new Error('read timeout'));

      const res = await request(ctx.app).get('/api/v1/carts/u1');

      expect(res.status).toBe(503);
      expect(res.body.error.code).toBe('STORAGE_ERROR');
    });
  });

  describe('GET /api/v1/carts/:user_id/lines', () => {
    it('returns the raw lines', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 2 });

      const res = await request(ctx.app).get('/api/v1/carts/u1/lines');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].user_id).toBe('u1');
    });

    it('returns an empty list for a user without lines', async () => {
      const res = await request(ctx.app).get('/api/v1/carts/nobody/lines');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([]);
    });
  });

  describe('PUT /api/v1/carts/:user_id/:product_id', () => {
    it('overwrites the quantity', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 5 });

      const res = await request(ctx.app).put(`/api/v1/carts/u1/${LIP_BALM_ID}`).send({ total_qty: 3 });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Cart quantity updated successfully.');
      expect(res.body.data.total_qty).toBe(3);
    });

    it('returns 404 when the user has no line for the product', async () => {
      const res = await request(ctx.app).put(`/api/v1/carts/u1/${LIP_BALM_ID}`).send({ total_qty: 3 });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe(`No cart item found for user 'u1' with product_id '${LIP_BALM_ID}'.`);
    });

    it('rejects a negative quantity', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 5 });

      const res = await request(ctx.app).put(`/api/v1/carts/u1/${LIP_BALM_ID}`).send({ total_qty: -2 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_ARGUMENT');
    });
  });

  describe('DELETE /api/v1/carts/:user_id/:product_id', () => {
    it('removes the line once', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 1 });

      const first = await request(ctx.app).delete(`/api/v1/carts/u1/${LIP_BALM_ID}`);
      const second = await request(ctx.app).delete(`/api/v1/carts/u1/${LIP_BALM_ID}`);

      expect(first.status).toBe(200);
      expect(first.body).toEqual({
        success: true,
        message: `Cart item successfully deleted for user 'u1' and product '${LIP_BALM_ID}'.`,
        data: null,
      });
      expect(second.status).toBe(404);
    });
  });

  describe('DELETE /api/v1/carts/:user_id', () => {
    it('clears every line of the user', async () => {
      await addToCart({ user_id: 'u1', product_id: LIP_BALM_ID, total_qty: 1 });
      await addToCart({ user_id: 'u1', product_id: HAND_CREAM_ID, total_qty: 1 });
      await addToCart({ user_id: 'u2', product_id: HAND_CREAM_ID, total_qty: 4 });

      const res = await request(ctx.app).delete('/api/v1/carts/u1');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("Cart items successfully deleted for user 'u1'.");
      expect(res.body.data).toEqual({ deleted_count: 2 });
      expect(ctx.store.lines.map(line => line.user_id)).toEqual(['u2']);
    });

    it('returns 404 when the cart is already empty', async () => {
      const res = await request(ctx.app).delete('/api/v1/carts/u1');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe("No cart item found for user 'u1'.");
    });
  });
});
