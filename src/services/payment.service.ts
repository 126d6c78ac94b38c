import type { Store, Transaction } from '../store/store';
import {
  PaymentTransactionStatus,
  type PaymentTarget,
  type PaymentTransaction,
  type RecordPaymentInput,
} from '../types/payment.types';
import { AppError, ErrorCode } from '../types/error.types';
import type { Clock } from '../utils/clock';
import { logger } from '../config/logger';

/**
 * Payment Service
 *
 * Records provider transactions against exactly one order or appointment.
 * Confirming the order or appointment is left to the lifecycle services.
 */
export class PaymentService {
  constructor(
    private store: Store,
    private clock: Clock
  ) {}

  async recordTransaction(tenantId: string, input: RecordPaymentInput): Promise<PaymentTransaction> {
    const payment = await this.store.atomic(async (tx) => {
      await this.assertTargetExists(tx, tenantId, input.target);
      return tx.payments.insert({
        tenantId,
        provider: input.provider,
        externalId: input.externalId,
        amount: input.amount,
        currency: input.currency,
        status: input.status,
        target: input.target,
        rawResponse: input.rawResponse ?? {},
        notes: input.notes ?? '',
        confirmedAt: input.status === PaymentTransactionStatus.PAID ? this.clock.now() : null,
      });
    });

    logger.info('Payment transaction recorded', {
      paymentId: payment.id,
      provider: payment.provider,
      target: payment.target.kind,
      status: payment.status,
    });
    return payment;
  }

  async getTransaction(tenantId: string, paymentId: string): Promise<PaymentTransaction> {
    const payment = await this.store.atomic((tx) => tx.payments.findById(tenantId, paymentId));
    if (!payment) {
      throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Payment transaction not found');
    }
    return payment;
  }

  private async assertTargetExists(tx: Transaction, tenantId: string, target: PaymentTarget): Promise<void> {
    switch (target.kind) {
      case 'ORDER': {
        const order = await tx.orders.findById(target.orderId);
        if (!order || order.tenantId !== tenantId) {
          throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Order not found');
        }
        return;
      }
      case 'APPOINTMENT': {
        const appointment = await tx.appointments.findById(tenantId, target.appointmentId);
        if (!appointment) {
          throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Appointment not found');
        }
        return;
      }
    }
  }
}
