import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { LoggingNotificationSink, WebhookNotificationSink } from '../src/services/notification.service';
import { OrderStatus, type Order } from '../src/types/raffle.types';

const order: Order = {
  id: 'order-1',
  tenantId: 'tenant-1',
  raffleId: 'raffle-1',
  contactId: 'contact-1',
  contactPhone: '+10000000001',
  contactName: 'Test Buyer',
  qty: 2,
  totalAmount: 20,
  currency: 'USD',
  status: OrderStatus.PAID,
  paymentProofMediaId: null,
  paidAt: new Date('2030-01-07T08:05:00Z'),
  expiresAt: new Date('2030-01-07T08:15:00Z'),
  createdAt: new Date('2030-01-07T08:00:00Z'),
  updatedAt: new Date('2030-01-07T08:05:00Z'),
};

describe('WebhookNotificationSink', () => {
  it('posts an order.paid event', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async (config) => {
        requests.push(config);
        return { data: {}, status: 204, statusText: 'No Content', headers: {}, config };
      },
    });

    await new WebhookNotificationSink('http://hooks.test/paid', http).notifyPaymentConfirmed(order);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('post');
    expect(JSON.parse(String(requests[0]?.data))).toEqual({
      event: 'order.paid',
      order: {
        id: 'order-1',
        tenantId: 'tenant-1',
        raffleId: 'raffle-1',
        contactId: 'contact-1',
        contactPhone: '+10000000001',
        qty: 2,
        totalAmount: 20,
        currency: 'USD',
        paidAt: '2030-01-07T08:05:00.000Z',
      },
    });
  });

  it('surfaces delivery failures to the caller', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    await expect(
      new WebhookNotificationSink('http://hooks.test/paid', http).notifyPaymentConfirmed(order)
    ).rejects.toThrow('connect ECONNREFUSED');
  });
});

describe('LoggingNotificationSink', () => {
  it('resolves without side effects', async () => {
    await expect(new LoggingNotificationSink().notifyPaymentConfirmed(order)).resolves.toBeUndefined();
  });
});
