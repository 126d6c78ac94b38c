/**
 * Raffle domain types
 */

export enum TicketStatus {
  AVAILABLE = 'AVAILABLE',
  RESERVED = 'RESERVED',
  SOLD = 'SOLD',
}

export enum OrderStatus {
  DRAFT = 'DRAFT',
  PENDING_PAYMENT = 'PENDING_PAYMENT',
  PAID = 'PAID',
  CANCELLED = 'CANCELLED',
  EXPIRED = 'EXPIRED',
}

// Allowed source states per target state
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  [OrderStatus.DRAFT]: [],
  [OrderStatus.PENDING_PAYMENT]: [OrderStatus.DRAFT],
  [OrderStatus.PAID]: [OrderStatus.PENDING_PAYMENT],
  [OrderStatus.CANCELLED]: [OrderStatus.DRAFT, OrderStatus.PENDING_PAYMENT, OrderStatus.EXPIRED],
  [OrderStatus.EXPIRED]: [OrderStatus.PENDING_PAYMENT],
};

export function canTransitionOrder(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[to].includes(from);
}

export interface Raffle {
  id: string;
  tenantId: string;
  title: string;
  description: string;
  ticketPrice: number;
  currency: string;
  isActive: boolean;
  minNumber: number;
  maxNumber: number;
  drawDate: Date | null;
  winnerNumber: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewRaffle {
  tenantId: string;
  title: string;
  description: string;
  ticketPrice: number;
  currency: string;
  isActive: boolean;
  minNumber: number;
  maxNumber: number;
  drawDate: Date | null;
}

export interface CreateRaffleInput {
  title: string;
  ticketPrice: number;
  maxNumber: number;
  minNumber?: number;
  description?: string;
  currency?: string;
  isActive?: boolean;
  drawDate?: Date | null;
}

export function totalTickets(raffle: Pick<Raffle, 'minNumber' | 'maxNumber'>): number {
  return raffle.maxNumber - raffle.minNumber + 1;
}

export interface TicketNumber {
  id: string;
  raffleId: string;
  number: number;
  status: TicketStatus;
  reservedByOrderId: string | null;
  reservedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TicketCounts {
  total: number;
  available: number;
  reserved: number;
  sold: number;
}

// Buyer identity handed over by the messaging channel
export interface Contact {
  id: string;
  phone: string;
  name?: string;
}

export interface Order {
  id: string;
  tenantId: string;
  raffleId: string;
  contactId: string;
  contactPhone: string;
  contactName: string | null;
  qty: number;
  totalAmount: number;
  currency: string;
  status: OrderStatus;
  paymentProofMediaId: string | null;
  paidAt: Date | null;
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewOrder {
  tenantId: string;
  raffleId: string;
  contact: Contact;
  qty: number;
  totalAmount: number;
  currency: string;
  status: OrderStatus;
  expiresAt: Date | null;
}

export type OrderPatch = Partial<Pick<Order, 'status' | 'paymentProofMediaId' | 'paidAt'>>;

export interface OrderTicket {
  id: string;
  orderId: string;
  ticketId: string;
  createdAt: Date;
}

export interface OrderWithTickets extends Order {
  ticketNumbers: number[];
}

export function isOrderExpired(order: Pick<Order, 'status' | 'expiresAt'>, now: Date): boolean {
  return (
    order.status === OrderStatus.PENDING_PAYMENT &&
    order.expiresAt !== null &&
    now.getTime() > order.expiresAt.getTime()
  );
}

export interface RaffleAvailability {
  raffleId: string;
  totalTickets: number;
  availableCount: number;
  reservedCount: number;
  soldCount: number;
  availableNumbers: number[];
}

export interface GenerateTicketsResult {
  raffleId: string;
  generated: number;
  deleted: number;
}

export interface ReleaseResult {
  order: Order;
  released: number;
}

export interface ExpireOrderResult {
  order: Order;
  expired: boolean;
  released: number;
}

export interface ExpireOrdersResult {
  expiredCount: number;
  expiredOrderIds: string[];
  // Orders the sweep could not expire this run, usually behind a busy lock
  failedOrderIds: string[];
}

// Database row types (snake_case from PostgreSQL; NUMERIC arrives as string)
export interface RaffleRow {
  id: string;
  tenant_id: string;
  title: string;
  description: string;
  ticket_price: string;
  currency: string;
  is_active: boolean;
  min_number: number;
  max_number: number;
  draw_date: Date | null;
  winner_number: number | null;
  created_at: Date;
  updated_at: Date;
}

export interface TicketNumberRow {
  id: string;
  raffle_id: string;
  number: number;
  status: string;
  reserved_by_order_id: string | null;
  reserved_until: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface OrderRow {
  id: string;
  tenant_id: string;
  raffle_id: string;
  contact_id: string;
  contact_phone: string;
  contact_name: string | null;
  qty: number;
  total_amount: string;
  currency: string;
  status: string;
  payment_proof_media_id: string | null;
  paid_at: Date | null;
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}
