import { randomUUID } from 'node:crypto';
import type { NewTenant, Tenant } from '../types/tenant.types';
import {
  ACTIVE_APPOINTMENT_STATUSES,
  AppointmentStatus,
  PaymentStatus,
  type Appointment,
  type AppointmentPatch,
  type Customer,
  type CustomerUpsert,
  type NewAppointment,
  type NewService,
  type Service,
} from '../types/appointment.types';
import {
  OrderStatus,
  TicketStatus,
  isOrderExpired,
  type NewOrder,
  type NewRaffle,
  type Order,
  type OrderPatch,
  type Raffle,
  type TicketCounts,
  type TicketNumber,
} from '../types/raffle.types';
import type { NewPaymentTransaction, PaymentTransaction } from '../types/payment.types';
import type { MemoryContext } from './memory.store';
import type {
  AppointmentRepository,
  CustomerRepository,
  OrderRepository,
  PaymentRepository,
  RaffleRepository,
  ServiceRepository,
  TenantRepository,
  TicketRepository,
} from './store';

export const TICKET_NUMBER_KEY = 'ticket_numbers_raffle_number_key';
export const CUSTOMER_PHONE_KEY = 'customers_tenant_phone_key';

function stamps(ctx: MemoryContext): { createdAt: Date; updatedAt: Date } {
  const now = ctx.clock.now();
  return { createdAt: now, updatedAt: now };
}

export class MemoryTenantRepository implements TenantRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(tenantId: string): Promise<Tenant | null> {
    return this.ctx.tables.tenants.find(tenantId);
  }

  async insert(tenant: NewTenant): Promise<Tenant> {
    return this.ctx.tables.tenants.insert({ id: randomUUID(), ...tenant, ...stamps(this.ctx) }, this.ctx.journal);
  }
}

export class MemoryServiceRepository implements ServiceRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(tenantId: string, serviceId: string): Promise<Service | null> {
    const service = this.ctx.tables.services.find(serviceId);
    return service && service.tenantId === tenantId ? service : null;
  }

  async lock(tenantId: string, serviceId: string): Promise<Service | null> {
    await this.ctx.lock(`service:${serviceId}`);
    return this.findById(tenantId, serviceId);
  }

  async insert(service: NewService): Promise<Service> {
    return this.ctx.tables.services.insert({ id: randomUUID(), ...service, ...stamps(this.ctx) }, this.ctx.journal);
  }
}

export class MemoryCustomerRepository implements CustomerRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(tenantId: string, customerId: string): Promise<Customer | null> {
    const customer = this.ctx.tables.customers.find(customerId);
    return customer && customer.tenantId === tenantId ? customer : null;
  }

  async upsertByPhone(input: CustomerUpsert): Promise<Customer> {
    const { customers } = this.ctx.tables;
    const key = `${input.tenantId}:${input.phone}`;
    // Serialises first-time bookings for the same phone
    await this.ctx.lock(`customer-phone:${key}`);

    const existing = customers.findByUnique(CUSTOMER_PHONE_KEY, key);
    if (!existing) {
      return customers.insert(
        {
          id: randomUUID(),
          tenantId: input.tenantId,
          name: input.name,
          email: input.email ?? null,
          phone: input.phone,
          notes: '',
          lastAppointmentAt: null,
          ...stamps(this.ctx),
        },
        this.ctx.journal
      );
    }

    const patch: Partial<Customer> = {};
    if (input.name && input.name !== existing.name) patch.name = input.name;
    if (input.email) patch.email = input.email;
    if (Object.keys(patch).length === 0) return existing;

    await this.ctx.lock(`customer:${existing.id}`);
    return customers.update(existing.id, { ...patch, updatedAt: this.ctx.clock.now() }, this.ctx.journal);
  }

  async setLastAppointmentAt(customerId: string, at: Date): Promise<void> {
    await this.ctx.lock(`customer:${customerId}`);
    this.ctx.tables.customers.update(
      customerId,
      { lastAppointmentAt: at, updatedAt: this.ctx.clock.now() },
      this.ctx.journal
    );
  }
}

export class MemoryAppointmentRepository implements AppointmentRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(tenantId: string, appointmentId: string): Promise<Appointment | null> {
    const appointment = this.ctx.tables.appointments.find(appointmentId);
    return appointment && appointment.tenantId === tenantId ? appointment : null;
  }

  async lock(tenantId: string, appointmentId: string): Promise<Appointment | null> {
    await this.ctx.lock(`appointment:${appointmentId}`);
    return this.findById(tenantId, appointmentId);
  }

  async insert(appointment: NewAppointment): Promise<Appointment> {
    return this.ctx.tables.appointments.insert(
      {
        id: randomUUID(),
        ...appointment,
        status: AppointmentStatus.PENDING,
        paymentStatus: PaymentStatus.PENDING,
        paymentTransactionId: null,
        internalNotes: '',
        confirmedAt: null,
        cancelledAt: null,
        completedAt: null,
        ...stamps(this.ctx),
      },
      this.ctx.journal
    );
  }

  async update(appointmentId: string, patch: AppointmentPatch): Promise<Appointment> {
    return this.ctx.tables.appointments.update(
      appointmentId,
      { ...patch, updatedAt: this.ctx.clock.now() },
      this.ctx.journal
    );
  }

  async findActiveStartingBetween(
    tenantId: string,
    serviceId: string,
    from: Date,
    to: Date
  ): Promise<Appointment[]> {
    return this.ctx.tables.appointments
      .findInGroup(serviceId)
      .filter(
        (a) =>
          a.tenantId === tenantId &&
          ACTIVE_APPOINTMENT_STATUSES.includes(a.status) &&
          a.scheduledAt.getTime() >= from.getTime() &&
          a.scheduledAt.getTime() < to.getTime()
      )
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
  }
}

export class MemoryRaffleRepository implements RaffleRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(raffleId: string): Promise<Raffle | null> {
    return this.ctx.tables.raffles.find(raffleId);
  }

  async lock(raffleId: string): Promise<Raffle | null> {
    await this.ctx.lock(`raffle:${raffleId}`);
    return this.findById(raffleId);
  }

  async insert(raffle: NewRaffle): Promise<Raffle> {
    return this.ctx.tables.raffles.insert(
      { id: randomUUID(), ...raffle, winnerNumber: null, ...stamps(this.ctx) },
      this.ctx.journal
    );
  }
}

const byNumber = (a: TicketNumber, b: TicketNumber): number => a.number - b.number;

export class MemoryTicketRepository implements TicketRepository {
  constructor(private ctx: MemoryContext) {}

  async counts(raffleId: string): Promise<TicketCounts> {
    const counts: TicketCounts = { total: 0, available: 0, reserved: 0, sold: 0 };
    for (const ticket of this.ctx.tables.tickets.findInGroup(raffleId)) {
      counts.total++;
      if (ticket.status === TicketStatus.AVAILABLE) counts.available++;
      else if (ticket.status === TicketStatus.RESERVED) counts.reserved++;
      else counts.sold++;
    }
    return counts;
  }

  async listNumbers(raffleId: string, status: TicketStatus): Promise<number[]> {
    return this.ctx.tables.tickets
      .findInGroup(raffleId)
      .filter((t) => t.status === status)
      .map((t) => t.number)
      .sort((a, b) => a - b);
  }

  async insertMany(raffleId: string, numbers: number[]): Promise<number> {
    for (const number of numbers) {
      this.ctx.tables.tickets.insert(
        {
          id: randomUUID(),
          raffleId,
          number,
          status: TicketStatus.AVAILABLE,
          reservedByOrderId: null,
          reservedUntil: null,
          ...stamps(this.ctx),
        },
        this.ctx.journal
      );
    }
    return numbers.length;
  }

  async deleteAll(raffleId: string): Promise<number> {
    const { tickets, orderTickets } = this.ctx.tables;
    const doomed = new Set(tickets.findInGroup(raffleId).map((t) => t.id));

    // order_tickets rows cascade with their ticket
    for (const link of orderTickets.all()) {
      if (doomed.has(link.ticketId)) orderTickets.delete(link.id, this.ctx.journal);
    }
    for (const id of doomed) {
      tickets.delete(id, this.ctx.journal);
    }
    return doomed.size;
  }

  async releaseExpired(raffleId: string, now: Date): Promise<number> {
    const expired = this.ctx.tables.tickets
      .findInGroup(raffleId)
      .filter(
        (t) =>
          t.status === TicketStatus.RESERVED &&
          t.reservedUntil !== null &&
          t.reservedUntil.getTime() < now.getTime()
      );
    for (const ticket of expired) {
      this.makeAvailable(ticket.id);
    }
    return expired.length;
  }

  async lockByNumbers(raffleId: string, numbers: number[]): Promise<TicketNumber[]> {
    const wanted = Array.from(new Set(numbers)).sort((a, b) => a - b);
    const locked: TicketNumber[] = [];

    for (const number of wanted) {
      const ticket = this.ctx.tables.tickets.findByUnique(TICKET_NUMBER_KEY, `${raffleId}:${number}`);
      if (!ticket) continue;
      await this.ctx.lock(`ticket:${ticket.id}`);
      // Re-read under the lock
      const current = this.ctx.tables.tickets.find(ticket.id);
      if (current) locked.push(current);
    }
    return locked;
  }

  async *scanAvailable(raffleId: string, batchSize: number): AsyncIterable<TicketNumber> {
    let after = Number.NEGATIVE_INFINITY;

    for (;;) {
      const batch = this.ctx.tables.tickets
        .findInGroup(raffleId)
        .filter((t) => t.status === TicketStatus.AVAILABLE && t.number > after)
        .sort(byNumber)
        .slice(0, batchSize);

      yield* batch;

      const last = batch[batch.length - 1];
      if (!last || batch.length < batchSize) return;
      after = last.number;
    }
  }

  async markReserved(ticketIds: string[], orderId: string, until: Date): Promise<void> {
    for (const id of ticketIds) {
      this.ctx.tables.tickets.update(
        id,
        {
          status: TicketStatus.RESERVED,
          reservedByOrderId: orderId,
          reservedUntil: until,
          updatedAt: this.ctx.clock.now(),
        },
        this.ctx.journal
      );
    }
  }

  async countReservedForOrder(orderId: string): Promise<number> {
    return this.reservedForOrder(orderId).length;
  }

  async releaseForOrder(orderId: string): Promise<number> {
    const reserved = this.reservedForOrder(orderId);
    for (const ticket of reserved) {
      this.makeAvailable(ticket.id);
    }
    return reserved.length;
  }

  async sellForOrder(orderId: string): Promise<number> {
    const reserved = this.reservedForOrder(orderId);
    for (const ticket of reserved) {
      this.ctx.tables.tickets.update(
        ticket.id,
        { status: TicketStatus.SOLD, reservedUntil: null, updatedAt: this.ctx.clock.now() },
        this.ctx.journal
      );
    }
    return reserved.length;
  }

  private reservedForOrder(orderId: string): TicketNumber[] {
    const order = this.ctx.tables.orders.find(orderId);
    if (!order) return [];
    return this.ctx.tables.tickets
      .findInGroup(order.raffleId)
      .filter((t) => t.status === TicketStatus.RESERVED && t.reservedByOrderId === orderId);
  }

  private makeAvailable(ticketId: string): void {
    this.ctx.tables.tickets.update(
      ticketId,
      {
        status: TicketStatus.AVAILABLE,
        reservedByOrderId: null,
        reservedUntil: null,
        updatedAt: this.ctx.clock.now(),
      },
      this.ctx.journal
    );
  }
}

export class MemoryOrderRepository implements OrderRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(orderId: string): Promise<Order | null> {
    return this.ctx.tables.orders.find(orderId);
  }

  async lock(orderId: string): Promise<Order | null> {
    await this.ctx.lock(`order:${orderId}`);
    return this.findById(orderId);
  }

  async insert(order: NewOrder): Promise<Order> {
    const { contact, ...fields } = order;
    return this.ctx.tables.orders.insert(
      {
        id: randomUUID(),
        ...fields,
        contactId: contact.id,
        contactPhone: contact.phone,
        contactName: contact.name ?? null,
        paymentProofMediaId: null,
        paidAt: null,
        ...stamps(this.ctx),
      },
      this.ctx.journal
    );
  }

  async update(orderId: string, patch: OrderPatch): Promise<Order> {
    return this.ctx.tables.orders.update(orderId, { ...patch, updatedAt: this.ctx.clock.now() }, this.ctx.journal);
  }

  async linkTickets(orderId: string, ticketIds: string[]): Promise<void> {
    for (const ticketId of ticketIds) {
      this.ctx.tables.orderTickets.insert(
        { id: randomUUID(), orderId, ticketId, createdAt: this.ctx.clock.now() },
        this.ctx.journal
      );
    }
  }

  async linkedTicketNumbers(orderId: string): Promise<number[]> {
    const numbers: number[] = [];
    for (const link of this.ctx.tables.orderTickets.findInGroup(orderId)) {
      const ticket = this.ctx.tables.tickets.find(link.ticketId);
      if (ticket) numbers.push(ticket.number);
    }
    return numbers.sort((a, b) => a - b);
  }

  async findExpiredIds(now: Date, limit: number): Promise<string[]> {
    return this.ctx.tables.orders
      .all()
      .filter((o) => o.status === OrderStatus.PENDING_PAYMENT && isOrderExpired(o, now))
      .sort((a, b) => (a.expiresAt?.getTime() ?? 0) - (b.expiresAt?.getTime() ?? 0))
      .slice(0, limit)
      .map((o) => o.id);
  }
}

export class MemoryPaymentRepository implements PaymentRepository {
  constructor(private ctx: MemoryContext) {}

  async findById(tenantId: string, paymentId: string): Promise<PaymentTransaction | null> {
    const payment = this.ctx.tables.payments.find(paymentId);
    return payment && payment.tenantId === tenantId ? payment : null;
  }

  async insert(payment: NewPaymentTransaction): Promise<PaymentTransaction> {
    return this.ctx.tables.payments.insert({ id: randomUUID(), ...payment, ...stamps(this.ctx) }, this.ctx.journal);
  }
}
