import axios, { type AxiosInstance } from 'axios';
import type { Order } from '../types/raffle.types';
import { logger } from '../config/logger';

/**
 * Outbound notifications. Delivery is best-effort: callers log failures and
 * never roll back the state change that triggered them.
 */
export interface NotificationSink {
  notifyPaymentConfirmed(order: Order): Promise<void>;
}

export class LoggingNotificationSink implements NotificationSink {
  async notifyPaymentConfirmed(order: Order): Promise<void> {
    logger.info('Payment confirmed', {
      orderId: order.id,
      contactPhone: order.contactPhone,
      qty: order.qty,
      totalAmount: order.totalAmount,
    });
  }
}

/**
 * Posts an `order.paid` event as JSON to a configured URL
 */
export class WebhookNotificationSink implements NotificationSink {
  private http: AxiosInstance;

  constructor(url: string, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: url, timeout: 5000 });
  }

  async notifyPaymentConfirmed(order: Order): Promise<void> {
    await this.http.post('', {
      event: 'order.paid',
      order: {
        id: order.id,
        tenantId: order.tenantId,
        raffleId: order.raffleId,
        contactId: order.contactId,
        contactPhone: order.contactPhone,
        qty: order.qty,
        totalAmount: order.totalAmount,
        currency: order.currency,
        paidAt: order.paidAt?.toISOString() ?? null,
      },
    });
    logger.debug('Payment webhook delivered', { orderId: order.id });
  }
}
