import type { Store } from '../store/store';
import type { ExpireOrdersResult } from '../types/raffle.types';
import type { Clock } from '../utils/clock';
import { logger } from '../config/logger';
import type { OrderLifecycleService } from './order-lifecycle.service';

export const DEFAULT_EXPIRY_BATCH = 100;

/**
 * Maintenance Service
 *
 * Optional sweep over overdue orders. Allocation and order reads already
 * expire lazily, so nothing depends on this running.
 */
export class MaintenanceService {
  constructor(
    private store: Store,
    private orders: OrderLifecycleService,
    private clock: Clock
  ) {}

  /**
   * Expire up to `limit` PENDING_PAYMENT orders past their expiresAt
   *
   * Each order is expired in its own transaction through markExpired, so an
   * order released concurrently is skipped rather than expired twice. A
   * failure on one order is logged and the sweep moves on to the next.
   */
  async expireOrders(limit: number = DEFAULT_EXPIRY_BATCH): Promise<ExpireOrdersResult> {
    logger.info('Running expire orders job', { limit });

    const now = this.clock.now();
    const candidates = await this.store.atomic((tx) => tx.orders.findExpiredIds(now, limit));

    const expiredOrderIds: string[] = [];
    const failedOrderIds: string[] = [];
    for (const orderId of candidates) {
      try {
        const result = await this.orders.markExpired(orderId);
        if (result.expired) {
          expiredOrderIds.push(orderId);
        }
      } catch (error) {
        failedOrderIds.push(orderId);
        logger.warn('Could not expire order', {
          orderId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info('Expire orders job complete', {
      expiredCount: expiredOrderIds.length,
      failedCount: failedOrderIds.length,
    });
    return { expiredCount: expiredOrderIds.length, expiredOrderIds, failedOrderIds };
  }
}
