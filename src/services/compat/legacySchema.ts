import z from 'zod';
import { LEGACY_STATUSES } from './types';

export const LegacyItemSchema = z
  .object({
    sku: z.string().nullable(),
    name: z.string().nullable(),
    price: z.number().finite(),
    quantity: z.number().int().min(1),
  })
  .passthrough();

export const LegacyOrderSchema = z
  .object({
    orderId: z.string(),
    status: z.enum(LEGACY_STATUSES),
    totalPrice: z.number().finite(),
    customerId: z.string().nullable(),
    customerName: z.string().nullable(),
    createdAt: z.string(),
    items: z.array(LegacyItemSchema),
  })
  .passthrough();
