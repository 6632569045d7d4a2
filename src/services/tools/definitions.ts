import type { ChatCompletionTool } from 'openai/resources/chat/completions';

const DURATION = {
  type: 'number',
  description: 'Appointment length in hours. If omitted it is derived from tattoo_price (price / 100 hours).',
};

const PRICE = {
  type: 'number',
  description: 'Agreed tattoo price in euros; used to derive the duration.',
};

export const CALENDAR_TOOLS: ChatCompletionTool[] = [
  {
    type: 'function',
    function: {
      name: 'check_calendar_availability',
      description: 'List bookable slots for tattoo appointments. The returned slots are held for this customer for a while.',
      parameters: {
        type: 'object',
        properties: {
          start_date: { type: 'string', description: 'First day to search (YYYY-MM-DD)' },
          end_date: { type: 'string', description: 'Last day to search (YYYY-MM-DD). Defaults to start_date.' },
          duration_hours: DURATION,
          tattoo_price: PRICE,
          preferred_time: {
            type: 'string',
            description: 'HH:MM. On the first day, suggestions start no earlier than this time.',
          },
        },
        required: ['start_date'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'create_tattoo_booking',
      description: 'Book a tattoo appointment once the customer has agreed a slot and given name and phone.',
      parameters: {
        type: 'object',
        properties: {
          customer_name: { type: 'string', description: "Customer's full name" },
          customer_phone: { type: 'string', description: "Customer's Greek phone number" },
          date: { type: 'string', description: 'Appointment date (YYYY-MM-DD)' },
          time: { type: 'string', description: 'Appointment time (HH:MM)' },
          duration_hours: DURATION,
          tattoo_price: PRICE,
          tattoo_description: { type: 'string', description: 'Short description of the design' },
        },
        required: ['customer_name', 'customer_phone', 'date', 'time'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'find_customer_booking',
      description: 'Find upcoming bookings by the phone number they were made with.',
      parameters: {
        type: 'object',
        properties: {
          phone_number: { type: 'string', description: "Customer's phone number" },
        },
        required: ['phone_number'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'cancel_tattoo_booking',
      description: 'Cancel a booking by its calendar event id.',
      parameters: {
        type: 'object',
        properties: {
          event_id: { type: 'string', description: 'Calendar event id from find_customer_booking' },
        },
        required: ['event_id'],
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'reschedule_tattoo_booking',
      description: 'Move an existing booking to a new date and time.',
      parameters: {
        type: 'object',
        properties: {
          event_id: { type: 'string', description: 'Calendar event id from find_customer_booking' },
          new_date: { type: 'string', description: 'New date (YYYY-MM-DD)' },
          new_time: { type: 'string', description: 'New time (HH:MM)' },
          duration_hours: DURATION,
          tattoo_price: PRICE,
        },
        required: ['event_id', 'new_date', 'new_time'],
      },
    },
  },
];
