import { DatabaseError } from 'pg';
import type { SqlClient, SqlPool } from '../config/database';
import {
  AppError,
  ErrorCode,
  InfrastructureError,
  UniqueConstraintError,
  statusForCode,
  toInfrastructureError,
} from '../types/error.types';
import { componentLogger } from '../config/logger';
import type { Store, Transaction } from './store';
import { PgTenantRepository } from '../repositories/tenant.repository';
import { PgServiceRepository } from '../repositories/service.repository';
import { PgCustomerRepository } from '../repositories/customer.repository';
import { PgAppointmentRepository } from '../repositories/appointment.repository';
import { PgRaffleRepository } from '../repositories/raffle.repository';
import { PgTicketRepository } from '../repositories/ticket.repository';
import { PgOrderRepository } from '../repositories/order.repository';
import { PgPaymentRepository } from '../repositories/payment.repository';

const logger = componentLogger('pg-store');

// lock_not_available, deadlock_detected, query_canceled, serialization_failure
const LOCK_ERROR_CODES = new Set(['55P03', '40P01', '57014', '40001']);
const UNIQUE_VIOLATION = '23505';
// foreign_key_violation, exclusion_violation
const REFERENCE_CONFLICT_CODES = new Set(['23503', '23P01']);

/**
 * Class 22 (data exception) and class 23 (integrity constraint) errors are
 * caused by the request, so they answer 4xx and are not retryable
 */
function rejectedByConstraint(error: DatabaseError, sqlState: string): AppError {
  const code = REFERENCE_CONFLICT_CODES.has(sqlState) ? ErrorCode.CONFLICT : ErrorCode.VALIDATION_ERROR;
  const details: Record<string, unknown> = { sqlState };
  if (error.constraint) {
    details.constraint = error.constraint;
  }
  return new AppError(code, error.detail ?? error.message, statusForCode(code), details);
}

/**
 * Map a driver error onto the application error model
 */
export function translatePgError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof DatabaseError) {
    if (error.code && LOCK_ERROR_CODES.has(error.code)) {
      return new InfrastructureError(ErrorCode.LOCK_TIMEOUT, 'Timed out waiting for a row lock', error);
    }
    if (error.code === UNIQUE_VIOLATION) {
      return new UniqueConstraintError(error.constraint ?? 'unique', error.detail ?? error.message);
    }
    if (error.code && (error.code.startsWith('22') || error.code.startsWith('23'))) {
      return rejectedByConstraint(error, error.code);
    }
  }
  return toInfrastructureError(error);
}

class PgTransaction implements Transaction {
  readonly tenants: PgTenantRepository;
  readonly services: PgServiceRepository;
  readonly customers: PgCustomerRepository;
  readonly appointments: PgAppointmentRepository;
  readonly raffles: PgRaffleRepository;
  readonly tickets: PgTicketRepository;
  readonly orders: PgOrderRepository;
  readonly payments: PgPaymentRepository;

  constructor(client: SqlClient) {
    this.tenants = new PgTenantRepository(client);
    this.services = new PgServiceRepository(client);
    this.customers = new PgCustomerRepository(client);
    this.appointments = new PgAppointmentRepository(client);
    this.raffles = new PgRaffleRepository(client);
    this.tickets = new PgTicketRepository(client);
    this.orders = new PgOrderRepository(client);
    this.payments = new PgPaymentRepository(client);
  }
}

/**
 * PostgreSQL ResourceStore
 *
 * One pooled client per transaction, BEGIN..COMMIT around the callback.
 * lock_timeout is set transaction-locally so a blocked FOR UPDATE fails
 * instead of waiting forever.
 */
export class PgStore implements Store {
  readonly driver = 'postgres' as const;

  constructor(
    private pool: SqlPool,
    private lockTimeoutMs: number
  ) {}

  async atomic<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw translatePgError(error);
    }

    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      await client.query("SELECT set_config('lock_timeout', $1, true)", [`${this.lockTimeoutMs}ms`]);
      const result = await fn(new PgTransaction(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // Connection is unusable; make the pool discard it
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.error('Rollback failed', { error: broken.message });
      }
      throw translatePgError(error);
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
