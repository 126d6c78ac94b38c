import { env } from './config/environment';
import type { Store } from './store/store';
import { systemClock, type Clock } from './utils/clock';
import { ReservoirSampler, type RandomSource } from './utils/random';
import { AvailabilityService } from './services/availability.service';
import { BookingService } from './services/booking.service';
import { TicketAllocatorService, type AllocatorOptions } from './services/ticket-allocator.service';
import { OrderLifecycleService } from './services/order-lifecycle.service';
import { RaffleService } from './services/raffle.service';
import { MaintenanceService } from './services/maintenance.service';
import { ProvisioningService } from './services/provisioning.service';
import { PaymentService } from './services/payment.service';
import {
  LoggingNotificationSink,
  WebhookNotificationSink,
  type NotificationSink,
} from './services/notification.service';

export interface ContainerDeps {
  store: Store;
  clock?: Clock;
  random?: RandomSource;
  notifier?: NotificationSink;
  options?: Partial<AllocatorOptions>;
}

export interface Container {
  store: Store;
  clock: Clock;
  provisioning: ProvisioningService;
  availability: AvailabilityService;
  bookings: BookingService;
  raffles: RaffleService;
  allocator: TicketAllocatorService;
  orders: OrderLifecycleService;
  payments: PaymentService;
  maintenance: MaintenanceService;
}

function defaultNotifier(): NotificationSink {
  return env.NOTIFICATION_WEBHOOK_URL
    ? new WebhookNotificationSink(env.NOTIFICATION_WEBHOOK_URL)
    : new LoggingNotificationSink();
}

/**
 * Wire every service against one store. Routes and scripts resolve their
 * dependencies from here instead of constructing them at import time.
 */
export function createContainer(deps: ContainerDeps): Container {
  const { store } = deps;
  const clock = deps.clock ?? systemClock;
  const random = deps.random ?? new ReservoirSampler();
  const notifier = deps.notifier ?? defaultNotifier();

  const allocatorOptions: AllocatorOptions = {
    reservationTimeoutMinutes: env.RESERVATION_TIMEOUT_MINUTES,
    minTicketsPerOrder: env.MIN_TICKETS_PER_ORDER,
    maxTicketsPerOrder: env.MAX_TICKETS_PER_ORDER,
    scanBatchSize: env.RANDOM_SCAN_BATCH_SIZE,
    ...deps.options,
  };

  const availability = new AvailabilityService(store, clock);
  const orders = new OrderLifecycleService(store, clock, notifier);

  return {
    store,
    clock,
    provisioning: new ProvisioningService(store),
    availability,
    bookings: new BookingService(store, availability, clock),
    raffles: new RaffleService(store, clock),
    allocator: new TicketAllocatorService(store, clock, random, allocatorOptions),
    orders,
    payments: new PaymentService(store, clock),
    maintenance: new MaintenanceService(store, orders, clock),
  };
}
