import { CalendarEvent } from '../types/calendar';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class SlotUnavailableError extends AppError {
  constructor(public slotKey: string, reason: string = 'Slot is no longer available') {
    super(409, `${reason}: ${slotKey}`, true);
    Object.setPrototypeOf(this, SlotUnavailableError.prototype);
  }
}

export class HoldExpiredError extends AppError {
  constructor(public slotKey: string) {
    super(410, `Hold expired or taken over: ${slotKey}`, true);
    Object.setPrototypeOf(this, HoldExpiredError.prototype);
  }
}

/**
 * Reschedule deleted the original event but could not create the replacement.
 * The cancelled event is attached so the studio can reconcile by hand.
 */
export class RescheduleIncompleteError extends AppError {
  constructor(
    public cancelledEvent: CalendarEvent,
    public originalError: Error
  ) {
    super(500, `Reschedule incomplete: event ${cancelledEvent.id} was cancelled but the new event was not created (${originalError.message})`, true);
    Object.setPrototypeOf(this, RescheduleIncompleteError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
