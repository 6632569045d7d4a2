import { DateTime } from 'luxon';
import { Intent, PrioritizedIntents } from '../types/agent';
import { Quote } from './pricing';

export const FALLBACK_REPLY = '⚠️ Προέκυψε πρόβλημα με την επεξεργασία του αιτήματός σου.';
export const TURN_FAILED_REPLY = '⚠️ Προέκυψε πρόβλημα με την απάντηση για ένα από τα αιτήματα σου.';

const SIGN_OFF = '❤️🐼';

const PERSONA = `You answer Instagram DMs for a tattoo studio. You are part of the team, not a chatbot.
Reply exactly the way the studio's people reply in the examples: same phrases, same emoji, same tone.
Do not improvise, do not explain technical details, do not invent prices or availability.
Always write in Greek. Always end your message with "${SIGN_OFF}".`;

const PRICING_RULES = `You handle pricing questions.
Never guess a price and never say "about", "starting from" or "it depends".
If the customer has not sent a clear photo or description, politely ask for one.`;

const BOOKING_RULES = `You handle appointment requests using the calendar tools.
Never mention the estimated duration or the agreed price unless the customer asks.
If details are missing (name, phone, date, time), ask for them politely.`;

const INFORMATION_RULES = `You answer questions about the studio: location, opening hours (Monday to Saturday, 11:00 to 20:00), aftercare, styles and artists.
Only state facts that appear in the examples.`;

const FOLLOW_UP_RULES = `The customer is following up on an earlier exchange. Use the conversation history to continue naturally.`;

const SUBCATEGORY_RULES: Record<string, string> = {
  new_appointment: `- When the customer asks for free times, call check_calendar_availability.
- If a price was agreed, pass it as tattoo_price so the duration is derived from it.
- Once a time is agreed and you have name and phone, call create_tattoo_booking.`,
  provide_details: `- If the message contains name and phone, call create_tattoo_booking for the agreed date and time.
- If the date or time is missing, ask for it.`,
  reschedule_appointment: `- First call find_customer_booking to locate the existing booking.
- Then ask for the new date and time and call reschedule_tattoo_booking.`,
  available_slots: `- Call check_calendar_availability to find free times.
- If a price was agreed, pass it as tattoo_price.
- Mention the full date of each day you offer, e.g. "Wednesday 5/6".
- Never mention the searched date range, the duration or the price.`,
};

export const TOOL_FOLLOW_UP_PROMPT = `${PERSONA}

You just used the calendar tools; answer the customer based on their results.
- Booking created or moved: confirm only the date and time and say they will get a reminder one hour before.
- Free times found: present them and ask which one suits.
- Bookings found for a cancellation: call cancel_tattoo_booking for the most recent one, or ask which one if unclear.
- Cancelled: confirm politely.
- No bookings found: ask for the correct phone number.
- An error result: apologise briefly and offer an alternative; never show error codes.`;

export const CLASSIFICATION_PROMPT = `You classify Instagram DMs sent to a tattoo studio. A message may carry several intents.
The user message may start with "[PREVIOUS_ASSISTANT]: ..." (the studio's last reply) and "[CURRENT_DATE: dd/mm/yyyy]".

Return JSON only, in this shape:
{"intents": [{"primary": "...", "subcategory": "...", "confidence": 0.0, "start_date": "dd/mm/yyyy", "end_date": "dd/mm/yyyy"}]}

primary is one of: pricing, booking_request, studio_information, follow_up, other.
Subcategories:
- pricing: new_quote_image (a tattoo photo was described), new_quote_no_image, price_follow_up
- booking_request: new_appointment, available_slots, provide_details, reschedule_appointment, cancel_appointment
- studio_information: location, hours, aftercare, styles
- follow_up: general
start_date and end_date only for available_slots, resolved against CURRENT_DATE ("next week", "Friday").
confidence is between 0 and 1.`;

export const IMAGE_ANALYSIS_PROMPT = `You work at a tattoo studio and extract pricing inputs from a tattoo photo.

1. Briefly describe the style (fine line, realism, etc.), the body area, and notable features (shading, colour).
2. On ONE line, in this order and separated by " | ", give:
   - estimated height in cm (h)
   - estimated width in cm (w)
   - inked share of the area as a decimal (ink), e.g. 0.45
   - difficulty factor D from this table:
       1.14 simple linework, no fill or shading
       1.21 light soft shading
       1.45 heavy shading or ornate detail
       1.60 solid black fill
       1.65 filled with one colour
       1.85 colour plus shading
       2.10 multicolour with strong shading
       2.50 realism (not a portrait)
       3.30 portrait, armour or texture
       3.75 very small script

Example:
Fine line minimal house outline on the wrist | h=5 | w=5 | ink=0.10 | D=1.14

Write nothing except the description and the values line.`;

export const IMAGE_ANALYSIS_REQUEST = 'Ανέλυσε την εικόνα του τατουάζ.';

export interface ConversationExample {
  query: string;
  response: string;
}

export interface PromptInput {
  intents: PrioritizedIntents;
  examples: ConversationExample[];
  /** Vision outputs for the images in this turn. */
  imageAnalyses: string[];
  quote: Quote | null;
  /** Most recent phone number seen in the conversation, if any. */
  knownPhone: string | null;
  today: DateTime;
}

function formatExamples(examples: ConversationExample[]): string {
  const body = examples
    .map((e, i) => `\nExample ${i + 1}:\nCustomer: ${e.query}\nStudio: ${e.response}\n`)
    .join('');
  return `\n\n## Similar past conversations:${body}\n\nUse the examples to match how the team replied.`;
}

function quoteInstruction(quote: Quote): string {
  if (quote.kind === 'single') {
    return `\n\nThe computed quote is two sizes: ${quote.low}€ and ${quote.high}€. Use exactly:
Καλησπέρα ${SIGN_OFF} , θα σας εκτυπώσουμε από κοντά 2 μεγέθη ένα στα *${quote.low}€* και ένα στα *${quote.high}€* για να διαλέξουμε μαζί ποιο σας ταιριάζει περισσότερο 😊 Οι ώρες μας γεμίζουν πολύ γρήγορα αυτές τις μέρες! 😊 Θέλετε να σας κλείσουμε ραντεβού?`;
  }
  return `\n\nThe computed total for the ${quote.count} tattoos is ${quote.total}€. Use exactly:
Καλησπέρα ${SIGN_OFF} , το συνολικό κόστος για τα τατουάζ είναι *${quote.total}€* 😊 Οι ώρες μας γεμίζουν πολύ γρήγορα αυτές τις μέρες! 😊 Θέλετε να σας κλείσουμε ραντεβού?`;
}

function multiIntentNote(primary: Intent, others: Intent[]): string {
  if (others.length === 0) return '';
  if (primary.primary === 'pricing' && others.some((i) => i.primary === 'booking_request')) {
    return '\n\nThe customer asked several things. Answer ONLY the price question, then say that once the design and price are agreed you will arrange the appointment.';
  }
  return `\n\nThe customer asked several things. Focus on the main one (${primary.primary}) and say you will come back to the rest.`;
}

function bookingSection(primary: Intent, knownPhone: string | null, today: DateTime): string {
  let section = `\n\nToday is ${today.toFormat('yyyy-MM-dd')} (${today.toFormat('cccc')}). Always use YYYY-MM-DD for dates.`;
  const sub = primary.subcategory ?? '';

  if (sub === 'cancel_appointment') {
    section += knownPhone
      ? `\n- Call find_customer_booking with phone_number "${knownPhone}".\n- If bookings are found, cancel the most recent with cancel_tattoo_booking and tell the customer.`
      : '\n- You need the phone number the booking was made with; ask for it.\n- Then call find_customer_booking and cancel_tattoo_booking.';
    return section;
  }

  const rules = SUBCATEGORY_RULES[sub];
  if (rules) section += `\n${rules}`;

  if (sub === 'available_slots') {
    section +=
      primary.start_date && primary.end_date
        ? `\n- Use start_date ${primary.start_date} and end_date ${primary.end_date}.`
        : `\n- No date was given: search from today (${today.toFormat('yyyy-MM-dd')}) to ${today.plus({ days: 7 }).toFormat('yyyy-MM-dd')} and offer the first free time.`;
  }
  return section;
}

/** Builds the system prompt for one turn from the prioritised intents. */
export function buildSystemPrompt(input: PromptInput): string {
  const { primary, others } = input.intents;
  let prompt = PERSONA;

  switch (primary.primary) {
    case 'pricing':
      prompt += `\n\n${PRICING_RULES}`;
      if (input.imageAnalyses.length > 0) {
        prompt += `\n\n# Image analysis:\n${input.imageAnalyses.join('\n')}`;
      }
      if (input.quote) {
        prompt += quoteInstruction(input.quote);
      }
      break;
    case 'booking_request':
      prompt += `\n\n${BOOKING_RULES}${bookingSection(primary, input.knownPhone, input.today)}`;
      break;
    case 'studio_information':
      prompt += `\n\n${INFORMATION_RULES}`;
      break;
    case 'follow_up':
      prompt += `\n\n${FOLLOW_UP_RULES}`;
      break;
    case 'other':
      break;
  }

  prompt += multiIntentNote(primary, others);
  prompt += formatExamples(input.examples);
  return prompt;
}
