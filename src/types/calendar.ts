export interface CalendarEvent {
  id: string;
  title: string;
  start: string;
  end: string;
  description?: string;
}

export interface EventDraft {
  title: string;
  start: string;
  end: string;
  description?: string;
}

export interface CalendarAdapter {
  readonly timezone: string;
  /** Overlapping events a slot can take before it counts as a conflict. */
  readonly capacity: number;
  listEvents(timeMin: string, timeMax: string, query?: string): Promise<CalendarEvent[]>;
  getEvent(eventId: string): Promise<CalendarEvent>;
  findEventsByPhone(phone: string, from: string): Promise<CalendarEvent[]>;
  countConflicts(start: string, end: string, excludeEventId?: string): Promise<number>;
  isConflict(start: string, end: string): Promise<boolean>;
  createEvent(draft: EventDraft): Promise<CalendarEvent>;
  cancelEvent(eventId: string): Promise<void>;
  rescheduleEvent(eventId: string, start: string, end: string, description?: string): Promise<CalendarEvent>;
}
