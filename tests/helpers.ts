import { createContainer, type Container } from '../src/container';
import { InMemoryStore } from '../src/store/memory.store';
import type { AllocatorOptions } from '../src/services/ticket-allocator.service';
import type { NotificationSink } from '../src/services/notification.service';
import type { Clock } from '../src/utils/clock';
import { ReservoirSampler, type RandomSource } from '../src/utils/random';
import { addMinutes } from '../src/utils/time';
import type { Tenant, TenantSettings } from '../src/types/tenant.types';
import type { CreateServiceInput, Service } from '../src/types/appointment.types';
import type { Contact, CreateRaffleInput, Order, Raffle } from '../src/types/raffle.types';

// Monday, 08:00 UTC
export const TEST_NOW = '2030-01-07T08:00:00.000Z';

export class ManualClock implements Clock {
  private current: Date;

  constructor(start: string = TEST_NOW) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: string): void {
    this.current = new Date(instant);
  }

  advanceMinutes(minutes: number): void {
    this.current = addMinutes(this.current, minutes);
  }
}

export class RecordingNotifier implements NotificationSink {
  readonly paid: Order[] = [];

  async notifyPaymentConfirmed(order: Order): Promise<void> {
    this.paid.push(order);
  }
}

/**
 * Reservoir sampler driven by a small LCG, so random reservations repeat
 * from run to run
 */
export function seededSampler(seed = 42): RandomSource {
  let state = seed >>> 0;
  return new ReservoirSampler((maxExclusive) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % maxExclusive;
  });
}

export const DEFAULT_ALLOCATOR_OPTIONS: AllocatorOptions = {
  reservationTimeoutMinutes: 15,
  minTicketsPerOrder: 1,
  maxTicketsPerOrder: 50,
  scanBatchSize: 4,
};

export interface TestEngine {
  store: InMemoryStore;
  clock: ManualClock;
  notifier: RecordingNotifier;
  container: Container;
}

export interface TestEngineOptions {
  now?: string;
  lockTimeoutMs?: number;
  random?: RandomSource;
  notifier?: NotificationSink;
  options?: Partial<AllocatorOptions>;
}

export function createTestEngine(opts: TestEngineOptions = {}): TestEngine {
  const clock = new ManualClock(opts.now);
  const store = new InMemoryStore({ clock, lockTimeoutMs: opts.lockTimeoutMs ?? 2000 });
  const notifier = new RecordingNotifier();
  const container = createContainer({
    store,
    clock,
    random: opts.random ?? seededSampler(),
    notifier: opts.notifier ?? notifier,
    options: { ...DEFAULT_ALLOCATOR_OPTIONS, ...opts.options },
  });
  return { store, clock, notifier, container };
}

let slugCounter = 0;

export async function seedTenant(engine: TestEngine, settings: Partial<TenantSettings> = {}): Promise<Tenant> {
  slugCounter++;
  return engine.container.provisioning.createTenant({
    slug: `tenant-${slugCounter}`,
    name: `Tenant ${slugCounter}`,
    settings: { timezone: 'UTC', businessHours: { start: 9, end: 18 }, slotIntervalMinutes: 30, ...settings },
  });
}

export async function seedService(
  engine: TestEngine,
  tenantId: string,
  overrides: Partial<CreateServiceInput> = {}
): Promise<Service> {
  return engine.container.provisioning.createService(tenantId, {
    name: 'Haircut',
    durationMinutes: 60,
    price: 25,
    ...overrides,
  });
}

/**
 * Raffle with its tickets generated
 */
export async function seedRaffle(
  engine: TestEngine,
  tenantId: string,
  overrides: Partial<CreateRaffleInput> = {}
): Promise<Raffle> {
  const raffle = await engine.container.raffles.createRaffle(tenantId, {
    title: 'Spring Raffle',
    ticketPrice: 10,
    minNumber: 1,
    maxNumber: 10,
    ...overrides,
  });
  await engine.container.raffles.generateTickets(raffle.id);
  return raffle;
}

export function contact(id = 'contact-1', phone = '+10000000001'): Contact {
  return { id, phone, name: 'Test Buyer' };
}

export const customer = (phone = '+10000000001', name = 'Alex Doe') => ({ name, phone });

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const tick = (ms = 5) => new Promise<void>((resolve) => setTimeout(resolve, ms));
