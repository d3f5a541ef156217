import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { OrderStatus, PaymentMethod } from '@orderdesk/shared';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../repositories/orderRepository';
import type { OrderLifecycleManager } from '../services/orderLifecycle';
import { sendError } from './errors';

// Shapes only; lengths, bounds and formats are checked by the order validation pipeline.
const amountSchema = z.union([z.number(), z.string()]);

const itemSchema = z.object({
  productId: z.string(),
  productName: z.string(),
  quantity: z.number(),
  unitPrice: amountSchema,
});

const addressSchema = z.object({
  street: z.string(),
  city: z.string(),
  state: z.string(),
  postalCode: z.string(),
  country: z.string().optional(),
});

const paymentSchema = z.object({
  method: z.nativeEnum(PaymentMethod),
  lastFourDigits: z.string().optional(),
  transactionId: z.string().optional(),
  processor: z.string().optional(),
});

const createOrderSchema = z.object({
  customerId: z.string(),
  customerEmail: z.string(),
  items: z.array(itemSchema),
  billingAddress: addressSchema,
  shippingAddress: addressSchema.optional(),
  payment: paymentSchema,
  tax: amountSchema.optional(),
  shipping: amountSchema.optional(),
  discount: amountSchema.optional(),
  currency: z.string().optional(),
  notes: z.string().optional(),
  source: z.string().optional(),
});

const updateOrderSchema = z
  .object({
    customerEmail: z.string().optional(),
    items: z.array(itemSchema).optional(),
    billingAddress: addressSchema.optional(),
    shippingAddress: addressSchema.optional(),
    tax: amountSchema.optional(),
    shipping: amountSchema.optional(),
    discount: amountSchema.optional(),
    notes: z.string().optional(),
  })
  .strict();

const dayParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');

const listQuerySchema = z.object({
  customerId: z.string().min(1).optional(),
  status: z.nativeEnum(OrderStatus).optional(),
  startDate: dayParam.optional(),
  endDate: dayParam.optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

const statusBodySchema = z.object({ status: z.nativeEnum(OrderStatus) });

const idParam = (req: Request, name = 'id') => z.string().trim().min(1).parse(req.params[name]);

export function createOrdersRouter(lifecycle: OrderLifecycleManager): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response) => {
    try {
      const input = createOrderSchema.parse(req.body);
      const order = await lifecycle.create(input);
      res.status(201).json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_CREATE_ERROR', 'Failed to create order');
    }
  });

  router.get('/', async (req: Request, res: Response) => {
    try {
      const { page, pageSize, ...filter } = listQuerySchema.parse(req.query);
      const result = await lifecycle.list(filter, page, pageSize);
      res.json({
        success: true,
        count: result.items.length,
        orders: result.items,
        totalCount: result.totalCount,
        page: result.page,
        pageSize: result.pageSize,
      });
    } catch (error) {
      sendError(res, error, 'ORDERS_LIST_ERROR', 'Failed to fetch orders');
    }
  });

  router.get('/number/:orderNumber', async (req: Request, res: Response) => {
    try {
      const order = await lifecycle.getByOrderNumber(idParam(req, 'orderNumber'));
      res.json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_GET_ERROR', 'Failed to get order');
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const order = await lifecycle.getById(idParam(req));
      res.json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_GET_ERROR', 'Failed to get order');
    }
  });

  router.patch('/:id', async (req: Request, res: Response) => {
    try {
      const input = updateOrderSchema.parse(req.body);
      const order = await lifecycle.update(idParam(req), input);
      res.json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_UPDATE_ERROR', 'Failed to update order');
    }
  });

  router.post('/:id/status', async (req: Request, res: Response) => {
    try {
      const { status } = statusBodySchema.parse(req.body);
      const order = await lifecycle.transition(idParam(req), status);
      res.json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_STATUS_UPDATE_ERROR', 'Failed to update order status');
    }
  });

  router.post('/:id/cancel', async (req: Request, res: Response) => {
    try {
      const order = await lifecycle.cancel(idParam(req));
      res.json({ success: true, order });
    } catch (error) {
      sendError(res, error, 'ORDER_CANCEL_ERROR', 'Failed to cancel order');
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      await lifecycle.delete(idParam(req));
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'ORDER_DELETE_ERROR', 'Failed to delete order');
    }
  });

  return router;
}
