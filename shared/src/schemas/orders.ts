/**
 * Orders Zod Schemas
 */

import { z } from 'zod';
import { FULFILLMENT_STATUSES, PAYMENT_STATUSES } from '../domain/constants.js';
import {
    amountSchema,
    customerRefSchema,
    dateRangeQuerySchema,
    emptyToNull,
    emptyToUndefined,
    optionalDateSchema,
    optionalText,
    requiredText,
    searchQuerySchema,
} from './common.js';

export const paymentStatusSchema = z.enum(PAYMENT_STATUSES, {
    errorMap: () => ({ message: `Payment status must be one of: ${PAYMENT_STATUSES.join(', ')}` }),
});

export const fulfillmentStatusSchema = z.enum(FULFILLMENT_STATUSES, {
    errorMap: () => ({ message: `Fulfillment status must be one of: ${FULFILLMENT_STATUSES.join(', ')}` }),
});

// ============================================
// INPUT SCHEMAS
// ============================================

export const orderInputSchema = z.object({
    orderNumber: requiredText('Order number', 100),
    orderDate: optionalDateSchema,
    customerId: customerRefSchema,
    totalAmount: amountSchema('Total amount'),
    currency: z.preprocess(emptyToUndefined, z.string().max(10, 'Currency must be at most 10 characters').optional()),
    paymentStatus: z.preprocess(emptyToNull, paymentStatusSchema.nullable()),
    fulfillmentStatus: z.preprocess(emptyToNull, fulfillmentStatusSchema.nullable()),
    /** Online Store, POS, marketplace... free text */
    salesChannel: optionalText('Sales channel', 100),
    note: optionalText('Note', 500),
});

export type OrderInput = z.infer<typeof orderInputSchema>;

// ============================================
// QUERY SCHEMAS
// ============================================

/** search matches order number, sales channel and payment status */
export const ordersListQuerySchema = dateRangeQuerySchema.extend({
    search: searchQuerySchema,
});

export type OrdersListQuery = z.infer<typeof ordersListQuerySchema>;

export const ordersExportQuerySchema = dateRangeQuerySchema;

export type OrdersExportQuery = z.infer<typeof ordersExportQuerySchema>;
