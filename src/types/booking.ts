export type BookingStatus = 'held' | 'confirmed' | 'cancelled';

export interface BookingDetails {
  /** Studio-local ISO timestamp of the slot start */
  start: string;
  customerName: string;
  customerPhone: string;
  tattooDescription?: string;
  price?: number;
  durationHours: number;
}

export interface BookingSlot {
  /** Studio-local ISO timestamp */
  start: string;
  durationHours: number;
}

export interface AvailableSlot {
  date: string;
  startTime: string;
  datetime: string;
}

export interface HoldToken {
  slotKey: string;
  holder: string;
  id: string;
}

export interface HoldRecord {
  token: string;
  holder: string;
  slotKey: string;
  createdAt: number;
  expiresAt: number;
}

export interface BookingResult {
  status: Extract<BookingStatus, 'confirmed'>;
  eventId: string;
  start: string;
  end: string;
}

export type Availability = 'free' | 'busy';
