import type { NewTenant, Tenant } from '../types/tenant.types';
import type {
  Appointment,
  AppointmentPatch,
  Customer,
  CustomerUpsert,
  NewAppointment,
  NewService,
  Service,
} from '../types/appointment.types';
import type {
  NewOrder,
  NewRaffle,
  Order,
  OrderPatch,
  Raffle,
  TicketCounts,
  TicketNumber,
  TicketStatus,
} from '../types/raffle.types';
import type { NewPaymentTransaction, PaymentTransaction } from '../types/payment.types';

/**
 * Resource store contract
 *
 * Every repository method runs inside the transaction that produced it.
 * `lock*` methods take an exclusive row lock held until the transaction ends;
 * callers acquire them parent first (service/raffle), then order, then
 * tickets in ascending number order.
 */

export interface TenantRepository {
  findById(tenantId: string): Promise<Tenant | null>;
  insert(tenant: NewTenant): Promise<Tenant>;
}

export interface ServiceRepository {
  findById(tenantId: string, serviceId: string): Promise<Service | null>;
  lock(tenantId: string, serviceId: string): Promise<Service | null>;
  insert(service: NewService): Promise<Service>;
}

export interface CustomerRepository {
  findById(tenantId: string, customerId: string): Promise<Customer | null>;
  // Insert, or on (tenant, phone) conflict update name/email when they changed
  upsertByPhone(customer: CustomerUpsert): Promise<Customer>;
  setLastAppointmentAt(customerId: string, at: Date): Promise<void>;
}

export interface AppointmentRepository {
  findById(tenantId: string, appointmentId: string): Promise<Appointment | null>;
  lock(tenantId: string, appointmentId: string): Promise<Appointment | null>;
  insert(appointment: NewAppointment): Promise<Appointment>;
  update(appointmentId: string, patch: AppointmentPatch): Promise<Appointment>;
  // PENDING/CONFIRMED appointments of a service starting in [from, to), ordered by start
  findActiveStartingBetween(tenantId: string, serviceId: string, from: Date, to: Date): Promise<Appointment[]>;
}

export interface RaffleRepository {
  findById(raffleId: string): Promise<Raffle | null>;
  lock(raffleId: string): Promise<Raffle | null>;
  insert(raffle: NewRaffle): Promise<Raffle>;
}

export interface TicketRepository {
  counts(raffleId: string): Promise<TicketCounts>;
  listNumbers(raffleId: string, status: TicketStatus): Promise<number[]>;
  insertMany(raffleId: string, numbers: number[]): Promise<number>;
  deleteAll(raffleId: string): Promise<number>;
  // RESERVED tickets whose hold ended before `now` become AVAILABLE
  releaseExpired(raffleId: string, now: Date): Promise<number>;
  // Locks the requested rows in ascending number order; missing numbers are simply absent
  lockByNumbers(raffleId: string, numbers: number[]): Promise<TicketNumber[]>;
  // Keyset cursor over AVAILABLE tickets in ascending number order
  scanAvailable(raffleId: string, batchSize: number): AsyncIterable<TicketNumber>;
  markReserved(ticketIds: string[], orderId: string, until: Date): Promise<void>;
  countReservedForOrder(orderId: string): Promise<number>;
  releaseForOrder(orderId: string): Promise<number>;
  // RESERVED -> SOLD, clearing reservedUntil but keeping the order reference
  sellForOrder(orderId: string): Promise<number>;
}

export interface OrderRepository {
  findById(orderId: string): Promise<Order | null>;
  lock(orderId: string): Promise<Order | null>;
  insert(order: NewOrder): Promise<Order>;
  update(orderId: string, patch: OrderPatch): Promise<Order>;
  linkTickets(orderId: string, ticketIds: string[]): Promise<void>;
  linkedTicketNumbers(orderId: string): Promise<number[]>;
  findExpiredIds(now: Date, limit: number): Promise<string[]>;
}

export interface PaymentRepository {
  findById(tenantId: string, paymentId: string): Promise<PaymentTransaction | null>;
  insert(payment: NewPaymentTransaction): Promise<PaymentTransaction>;
}

export interface Transaction {
  readonly tenants: TenantRepository;
  readonly services: ServiceRepository;
  readonly customers: CustomerRepository;
  readonly appointments: AppointmentRepository;
  readonly raffles: RaffleRepository;
  readonly tickets: TicketRepository;
  readonly orders: OrderRepository;
  readonly payments: PaymentRepository;
}

export interface Store {
  readonly driver: 'memory' | 'postgres';
  /**
   * Run `fn` as one atomic unit: all writes commit together or none do.
   * Errors that are not AppErrors surface as InfrastructureError.
   */
  atomic<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
