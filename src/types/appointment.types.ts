/**
 * Appointment domain types
 */

export enum AppointmentStatus {
  PENDING = 'PENDING',
  CONFIRMED = 'CONFIRMED',
  CANCELLED = 'CANCELLED',
  COMPLETED = 'COMPLETED',
  NO_SHOW = 'NO_SHOW',
}

export enum PaymentStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  REFUNDED = 'REFUNDED',
}

// Appointments that still hold their slot
export const ACTIVE_APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  AppointmentStatus.PENDING,
  AppointmentStatus.CONFIRMED,
];

// Allowed source states per target state
export const APPOINTMENT_TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  [AppointmentStatus.PENDING]: [],
  [AppointmentStatus.CONFIRMED]: [AppointmentStatus.PENDING],
  [AppointmentStatus.CANCELLED]: [AppointmentStatus.PENDING, AppointmentStatus.CONFIRMED],
  [AppointmentStatus.COMPLETED]: [AppointmentStatus.CONFIRMED],
  [AppointmentStatus.NO_SHOW]: [AppointmentStatus.CONFIRMED],
};

export function canTransitionAppointment(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return APPOINTMENT_TRANSITIONS[to].includes(from);
}

export const MAX_SERVICE_DURATION_MINUTES = 24 * 60;

export interface Service {
  id: string;
  tenantId: string;
  name: string;
  description: string;
  durationMinutes: number;
  price: number;
  currency: string;
  isActive: boolean;
  bufferTimeMinutes: number;
  maxBookingsPerDay: number;
  advanceBookingDays: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewService {
  tenantId: string;
  name: string;
  description: string;
  durationMinutes: number;
  price: number;
  currency: string;
  isActive: boolean;
  bufferTimeMinutes: number;
  maxBookingsPerDay: number;
  advanceBookingDays: number;
}

// Create service input (optional fields fall back to catalogue defaults)
export interface CreateServiceInput {
  name: string;
  durationMinutes: number;
  price: number;
  description?: string;
  currency?: string;
  isActive?: boolean;
  bufferTimeMinutes?: number;
  maxBookingsPerDay?: number;
  advanceBookingDays?: number;
}

export interface Customer {
  id: string;
  tenantId: string;
  name: string;
  email: string | null;
  phone: string;
  notes: string;
  lastAppointmentAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CustomerData {
  name: string;
  phone: string;
  email?: string;
}

export interface CustomerUpsert extends CustomerData {
  tenantId: string;
}

export interface Appointment {
  id: string;
  tenantId: string;
  serviceId: string;
  customerId: string;
  scheduledAt: Date;
  durationMinutes: number;
  status: AppointmentStatus;
  paymentStatus: PaymentStatus;
  totalAmount: number;
  currency: string;
  paymentTransactionId: string | null;
  customerNotes: string;
  internalNotes: string;
  createdAt: Date;
  updatedAt: Date;
  confirmedAt: Date | null;
  cancelledAt: Date | null;
  completedAt: Date | null;
}

export interface NewAppointment {
  tenantId: string;
  serviceId: string;
  customerId: string;
  scheduledAt: Date;
  durationMinutes: number;
  totalAmount: number;
  currency: string;
  customerNotes: string;
}

export type AppointmentPatch = Partial<
  Pick<
    Appointment,
    | 'status'
    | 'paymentStatus'
    | 'paymentTransactionId'
    | 'internalNotes'
    | 'confirmedAt'
    | 'cancelledAt'
    | 'completedAt'
  >
>;

export function appointmentEndTime(appointment: Pick<Appointment, 'scheduledAt' | 'durationMinutes'>): Date {
  return new Date(appointment.scheduledAt.getTime() + appointment.durationMinutes * 60_000);
}

export type SlotCheck = { available: true } | { available: false; reason: 'overlap' | 'daily_limit' };

export interface AvailabilityDay {
  availableCount: number;
  bookedCount: number;
  slots: Date[];
}

export type AvailabilityCalendar = Record<string, AvailabilityDay>;

// Database row types (snake_case from PostgreSQL; NUMERIC arrives as string)
export interface ServiceRow {
  id: string;
  tenant_id: string;
  name: string;
  description: string;
  duration_minutes: number;
  price: string;
  currency: string;
  is_active: boolean;
  buffer_time_minutes: number;
  max_bookings_per_day: number;
  advance_booking_days: number;
  created_at: Date;
  updated_at: Date;
}

export interface CustomerRow {
  id: string;
  tenant_id: string;
  name: string;
  email: string | null;
  phone: string;
  notes: string;
  last_appointment_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface AppointmentRow {
  id: string;
  tenant_id: string;
  service_id: string;
  customer_id: string;
  scheduled_at: Date;
  duration_minutes: number;
  status: string;
  payment_status: string;
  total_amount: string;
  currency: string;
  payment_transaction_id: string | null;
  customer_notes: string;
  internal_notes: string;
  created_at: Date;
  updated_at: Date;
  confirmed_at: Date | null;
  cancelled_at: Date | null;
  completed_at: Date | null;
}
