/**
 * Prometheus metrics
 *
 * Each app gets its own registry: a request counter labelled by method and
 * route template, and gauges that mirror the dashboard figures. The gauges
 * are refreshed from the database on every scrape of /metrics.
 */

import { Counter, Gauge, Registry } from 'prom-client';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { DashboardSummary } from '@storekeep/shared';

export const METRICS_PATH = '/metrics';

const PREFIX = 'storekeep_';

export interface AppMetrics {
    registry: Registry;
    /** Counts every routed request except scrapes of /metrics */
    countRequests: RequestHandler;
    recordSummary: (summary: DashboardSummary) => void;
}

/**
 * Route template of a matched request, e.g. `/api/customers/:id`.
 * Undefined when no route matched.
 */
export function endpointLabel(req: Request): string | undefined {
    const route: unknown = req.route;
    if (typeof route !== 'object' || route === null || !('path' in route) || typeof route.path !== 'string') {
        return undefined;
    }

    // The router restores baseUrl once an error leaves it, so rebuild the
    // mount prefix from the original URL instead
    const routeSegments = route.path.split('/').filter(Boolean);
    const urlSegments = req.originalUrl.replace(/\?.*$/, '').split('/').filter(Boolean);
    const mountSegments = urlSegments.slice(0, Math.max(0, urlSegments.length - routeSegments.length));

    return `/${[...mountSegments, ...routeSegments].join('/')}`;
}

function gauge(registry: Registry, name: string, help: string): Gauge {
    return new Gauge({ name: `${PREFIX}${name}`, help, registers: [registry] });
}

export function createMetrics(): AppMetrics {
    const registry = new Registry();

    const requests = new Counter({
        name: `${PREFIX}request_total`,
        help: 'Total HTTP requests handled by a route.',
        labelNames: ['method', 'endpoint'] as const,
        registers: [registry],
    });

    const customersTotal = gauge(registry, 'customers_total', 'Total customers.');
    const ordersTotal = gauge(registry, 'orders_total', 'Total orders.');
    const incomeTotal = gauge(registry, 'income_total', 'Total income amount.');
    const expenseTotal = gauge(registry, 'expense_total', 'Total expense amount.');
    const openTasksTotal = gauge(registry, 'open_tasks_total', 'Tasks not yet done.');
    const ordersToday = gauge(registry, 'orders_today', 'Orders dated today (UTC).');
    const incomeToday = gauge(registry, 'income_today', 'Income recorded today (UTC).');
    const expenseToday = gauge(registry, 'expense_today', 'Expenses recorded today (UTC).');

    const countRequests: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
        res.on('finish', () => {
            const endpoint = endpointLabel(req);
            if (endpoint !== undefined && endpoint !== METRICS_PATH) {
                requests.inc({ method: req.method, endpoint });
            }
        });
        next();
    };

    function recordSummary({ stats, today }: DashboardSummary): void {
        customersTotal.set(stats.totalCustomers);
        ordersTotal.set(stats.totalOrders);
        incomeTotal.set(stats.totalIncome);
        expenseTotal.set(stats.totalExpense);
        openTasksTotal.set(stats.openTasks);
        ordersToday.set(today.ordersToday);
        incomeToday.set(today.incomeToday);
        expenseToday.set(today.expenseToday);
    }

    return { registry, countRequests, recordSummary };
}
