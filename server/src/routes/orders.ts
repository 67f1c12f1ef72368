/**
 * @module routes/orders
 * @description Orders, with the customer's name joined in for display
 *
 * The list response carries totalSales, the sum of totalAmount over the
 * listed rows.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    idParamSchema,
    orderInputSchema,
    ordersListQuerySchema,
    RECORD_DEFAULTS,
    todayDateString,
    type OrdersListResponse,
} from '@storekeep/shared';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    createOrderKysely,
    deleteOrderKysely,
    getOrderKysely,
    listOrdersKysely,
    sumOrderTotals,
    updateOrderKysely,
} from '../db/queries/index.js';
import { assertCustomerRef } from '../utils/customerUtils.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { orderLogger } from '../utils/logger.js';

const router: Router = Router();

router.use(authenticateToken);

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(ordersListQuerySchema, req.query);

    const orders = await listOrdersKysely(req.db, {
        search: query.search,
        startDate: query.start_date,
        endDate: query.end_date,
    });

    const body: OrdersListResponse = { orders, totalSales: sumOrderTotals(orders) };
    res.json(body);
}));

router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    const order = await getOrderKysely(req.db, id);
    if (!order) {
        throw new NotFoundError('Order not found', 'Order', id);
    }

    res.json(order);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { orderDate, currency, ...input } = parseInput(orderInputSchema, req.body);
    await assertCustomerRef(req.db, input.customerId);

    const created = await createOrderKysely(req.db, {
        ...input,
        orderDate: orderDate ?? todayDateString(),
        currency: currency ?? RECORD_DEFAULTS.currency,
    });

    orderLogger.info({ orderId: created.id, orderNumber: created.orderNumber }, 'Order created');
    res.status(201).json(await getOrderKysely(req.db, created.id));
}));

router.put('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { orderDate, currency, ...input } = parseInput(orderInputSchema, req.body);
    await assertCustomerRef(req.db, input.customerId);

    // Omitted orderDate and currency keep their stored values
    const updated = await updateOrderKysely(req.db, id, {
        ...input,
        ...(orderDate !== undefined && { orderDate }),
        ...(currency !== undefined && { currency }),
    });
    if (!updated) {
        throw new NotFoundError('Order not found', 'Order', id);
    }

    orderLogger.info({ orderId: id }, 'Order updated');
    res.json(await getOrderKysely(req.db, id));
}));

router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    if (!(await deleteOrderKysely(req.db, id))) {
        throw new NotFoundError('Order not found', 'Order', id);
    }

    orderLogger.info({ orderId: id }, 'Order deleted');
    res.json({ success: true });
}));

export default router;
