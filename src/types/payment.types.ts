/**
 * Payment transaction types
 */

export enum PaymentProvider {
  BANCARD = 'BANCARD',
  MANUAL = 'MANUAL',
}

export enum PaymentTransactionStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  FAILED = 'FAILED',
  REFUNDED = 'REFUNDED',
}

// What a transaction pays for: exactly one of a raffle order or an appointment
export type PaymentTarget =
  | { kind: 'ORDER'; orderId: string }
  | { kind: 'APPOINTMENT'; appointmentId: string };

export interface PaymentTransaction {
  id: string;
  tenantId: string;
  provider: PaymentProvider;
  externalId: string;
  amount: number;
  currency: string;
  status: PaymentTransactionStatus;
  target: PaymentTarget;
  rawResponse: Record<string, unknown>;
  notes: string;
  createdAt: Date;
  updatedAt: Date;
  confirmedAt: Date | null;
}

export interface NewPaymentTransaction {
  tenantId: string;
  provider: PaymentProvider;
  externalId: string;
  amount: number;
  currency: string;
  status: PaymentTransactionStatus;
  target: PaymentTarget;
  rawResponse: Record<string, unknown>;
  notes: string;
  confirmedAt: Date | null;
}

export type RecordPaymentInput = Omit<NewPaymentTransaction, 'tenantId' | 'rawResponse' | 'notes' | 'confirmedAt'> & {
  rawResponse?: Record<string, unknown>;
  notes?: string;
};

// Database row type: exactly one of order_id / appointment_id is set
export interface PaymentTransactionRow {
  id: string;
  tenant_id: string;
  provider: string;
  external_id: string;
  amount: string;
  currency: string;
  status: string;
  order_id: string | null;
  appointment_id: string | null;
  raw_response: Record<string, unknown>;
  notes: string;
  created_at: Date;
  updated_at: Date;
  confirmed_at: Date | null;
}
