import type { Tenant } from '../types/tenant.types';
import type { Appointment, Customer, Service } from '../types/appointment.types';
import type { Order, OrderTicket, Raffle, TicketNumber } from '../types/raffle.types';
import type { PaymentTransaction } from '../types/payment.types';
import { toInfrastructureError } from '../types/error.types';
import { componentLogger } from '../config/logger';
import { type Clock, systemClock } from '../utils/clock';
import { LockManager } from './lock-manager';
import { MemoryTable, type Journal } from './memory.table';
import type { Store, Transaction } from './store';
import {
  CUSTOMER_PHONE_KEY,
  TICKET_NUMBER_KEY,
  MemoryAppointmentRepository,
  MemoryCustomerRepository,
  MemoryOrderRepository,
  MemoryPaymentRepository,
  MemoryRaffleRepository,
  MemoryServiceRepository,
  MemoryTenantRepository,
  MemoryTicketRepository,
} from './memory.repositories';

const logger = componentLogger('memory-store');

export interface MemoryTables {
  tenants: MemoryTable<Tenant>;
  services: MemoryTable<Service>;
  customers: MemoryTable<Customer>;
  appointments: MemoryTable<Appointment>;
  raffles: MemoryTable<Raffle>;
  tickets: MemoryTable<TicketNumber>;
  orders: MemoryTable<Order>;
  orderTickets: MemoryTable<OrderTicket>;
  payments: MemoryTable<PaymentTransaction>;
}

function createTables(): MemoryTables {
  return {
    tenants: new MemoryTable<Tenant>({ unique: [{ name: 'tenants_slug_key', key: (t) => t.slug }] }),
    services: new MemoryTable<Service>({
      groupBy: (s) => s.tenantId,
      unique: [{ name: 'services_tenant_name_key', key: (s) => `${s.tenantId}:${s.name}` }],
    }),
    customers: new MemoryTable<Customer>({
      unique: [{ name: CUSTOMER_PHONE_KEY, key: (c) => `${c.tenantId}:${c.phone}` }],
    }),
    appointments: new MemoryTable<Appointment>({ groupBy: (a) => a.serviceId }),
    raffles: new MemoryTable<Raffle>(),
    tickets: new MemoryTable<TicketNumber>({
      groupBy: (t) => t.raffleId,
      unique: [{ name: TICKET_NUMBER_KEY, key: (t) => `${t.raffleId}:${t.number}` }],
    }),
    orders: new MemoryTable<Order>(),
    orderTickets: new MemoryTable<OrderTicket>({
      groupBy: (l) => l.orderId,
      unique: [{ name: 'order_tickets_order_ticket_key', key: (l) => `${l.orderId}:${l.ticketId}` }],
    }),
    payments: new MemoryTable<PaymentTransaction>(),
  };
}

/**
 * State shared by the repositories of one memory transaction
 */
export interface MemoryContext {
  readonly tables: MemoryTables;
  readonly journal: Journal;
  readonly clock: Clock;
  lock(key: string): Promise<void>;
}

class MemoryTransaction implements Transaction, MemoryContext {
  readonly journal: Journal = [];
  private held: Map<string, () => void> = new Map();

  readonly tenants = new MemoryTenantRepository(this);
  readonly services = new MemoryServiceRepository(this);
  readonly customers = new MemoryCustomerRepository(this);
  readonly appointments = new MemoryAppointmentRepository(this);
  readonly raffles = new MemoryRaffleRepository(this);
  readonly tickets = new MemoryTicketRepository(this);
  readonly orders = new MemoryOrderRepository(this);
  readonly payments = new MemoryPaymentRepository(this);

  constructor(
    readonly tables: MemoryTables,
    readonly clock: Clock,
    private locks: LockManager
  ) {}

  // Reentrant within the transaction, like a row lock taken twice
  async lock(key: string): Promise<void> {
    if (this.held.has(key)) return;
    const release = await this.locks.acquire(key);
    this.held.set(key, release);
  }

  rollback(): void {
    for (let i = this.journal.length - 1; i >= 0; i--) {
      this.journal[i]?.();
    }
    this.journal.length = 0;
  }

  releaseLocks(): void {
    for (const release of this.held.values()) {
      release();
    }
    this.held.clear();
  }
}

export interface InMemoryStoreOptions {
  clock?: Clock;
  lockTimeoutMs?: number;
}

/**
 * In-process ResourceStore
 *
 * Writes apply immediately and are undone from the journal on failure.
 * Row locks are keyed promise chains with a bounded wait. Reads that take no
 * lock may observe writes of transactions still in flight.
 */
export class InMemoryStore implements Store {
  readonly driver = 'memory' as const;
  readonly tables: MemoryTables = createTables();
  private clock: Clock;
  private locks: LockManager;

  constructor(options: InMemoryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.locks = new LockManager(options.lockTimeoutMs ?? 5000);
  }

  async atomic<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this.tables, this.clock, this.locks);
    try {
      return await fn(tx);
    } catch (error) {
      tx.rollback();
      logger.debug('Memory transaction rolled back', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw toInfrastructureError(error);
    } finally {
      tx.releaseLocks();
    }
  }

  async close(): Promise<void> {
    logger.debug('In-memory store closed');
  }
}
