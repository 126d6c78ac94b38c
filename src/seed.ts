import type { Container } from './container';
import { logger } from './config/logger';

/**
 * Demo tenant with one service and one raffle, for the in-memory store in
 * development. Nothing here runs against PostgreSQL.
 */
export async function seedDemoData(container: Container): Promise<void> {
  const tenant = await container.provisioning.createTenant({
    slug: 'demo',
    name: 'Demo Studio',
    settings: { timezone: 'UTC', businessHours: { start: 9, end: 18 }, slotIntervalMinutes: 30 },
  });

  const service = await container.provisioning.createService(tenant.id, {
    name: 'Consultation',
    durationMinutes: 60,
    price: 50,
    bufferTimeMinutes: 15,
  });

  const raffle = await container.raffles.createRaffle(tenant.id, {
    title: 'Demo Raffle',
    ticketPrice: 10,
    minNumber: 1,
    maxNumber: 100,
  });
  await container.raffles.generateTickets(raffle.id);

  logger.info('Seeded demo data', { tenantId: tenant.id, serviceId: service.id, raffleId: raffle.id });
}
