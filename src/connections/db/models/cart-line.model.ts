// CartLine Model - one row per (user_id, product_id) once merged

// total_qty is a PostgreSQL INTEGER
export const MAX_LINE_QTY = 2147483647;

export interface CartLine {
  id: string; // UUID, immutable
  user_id: string; // opaque owner identifier, not a foreign key
  product_id: string; // UUID of an existing product at write time
  total_qty: number; // always > 0 for a persisted row
  created_at: Date;
  updated_at: Date;
}

/**
 * Read-only, per-product summary of a user's cart lines joined with the
 * product they point at.
 */
export interface AggregatedCartView {
  id: string; // id of the earliest-created contributing line
  product_id: string;
  total_qty: number; // sum over contributing lines
  created_at: Date; // earliest created_at
  updated_at: Date; // latest updated_at
  product_name: string;
  description: string;
  price: string; // decimal string
  sub_total_price: string; // total_qty * price, exact decimal
  img_url: string | null;
}
