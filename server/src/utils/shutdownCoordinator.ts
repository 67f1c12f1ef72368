/**
 * Shutdown Coordinator
 *
 * Runs registered close handlers (HTTP server, database) once on
 * SIGINT/SIGTERM, each bounded by its own timeout.
 */

import { serverLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * @param timeout - Max time to wait for handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            serverLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }

        this.handlers.set(name, { name, handler, timeout });
        serverLogger.debug({ name, timeout }, 'Shutdown handler registered');
    }

    /**
     * Execute all shutdown handlers in registration order.
     * The server closes before the database it reads from.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            serverLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        serverLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];

        for (const { name, handler, timeout } of this.handlers.values()) {
            const start = Date.now();
            let timer: NodeJS.Timeout | undefined;

            try {
                const result = await Promise.race([
                    (async () => {
                        await handler();
                        return { timedOut: false };
                    })(),
                    new Promise<{ timedOut: boolean }>((resolve) => {
                        timer = setTimeout(() => resolve({ timedOut: true }), timeout);
                    }),
                ]);

                const duration = Date.now() - start;
                if (result.timedOut) {
                    serverLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                    results.push({ name, success: false, error: 'Timeout', duration });
                } else {
                    serverLogger.debug({ name, duration }, 'Shutdown handler completed');
                    results.push({ name, success: true, duration });
                }
            } catch (error: unknown) {
                const duration = Date.now() - start;
                const errorMsg = error instanceof Error ? error.message : 'Unknown error';
                serverLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
                results.push({ name, success: false, error: errorMsg, duration });
            } finally {
                clearTimeout(timer);
            }
        }

        const successful = results.filter(r => r.success).length;
        serverLogger.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }
}

// Export singleton instance
export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
