import { z } from 'zod';

export const orderCreateSchema = z.object({
  user_id: z.string().min(1),
  item: z.string().min(1),
  amount: z.number().int(),
});

// Upstream owns this shape; extra fields are kept so the body goes back verbatim
export const orderStatusSchema = z
  .object({
    id: z.string().min(1),
    status: z.string(),
    item: z.string(),
    amount: z.number(),
    user_id: z.string(),
    updated_at: z.string(),
  })
  .passthrough();

export type OrderCreate = z.infer<typeof orderCreateSchema>;
export type OrderStatus = z.infer<typeof orderStatusSchema>;

export type OrderSource = 'cache' | 'upstream';

export interface OrderLookup {
  order: OrderStatus;
  source: OrderSource;
}
