export interface TattooMeasurement {
  heightCm: number;
  widthCm: number;
  ink: number;
  difficulty: number;
}

export type Quote =
  | { kind: 'single'; low: number; high: number }
  | { kind: 'multiple'; total: number; count: number };

export const MIN_PRICE = 45;
const ROUNDING = 5;
const INK_MULTIPLIER = 0.3;
const MULTI_TATTOO_DISCOUNT = 0.1;

const MEASUREMENT_LINE =
  /h\s*=\s*([\d.]+)\s*\|\s*w\s*=\s*([\d.]+)\s*\|\s*ink\s*=\s*([\d.]+)\s*\|\s*D\s*=\s*([\d.]+)/i;

/** Reads the `h=.. | w=.. | ink=.. | D=..` line the vision prompt asks for. */
export function parseMeasurement(analysis: string): TattooMeasurement | null {
  const match = MEASUREMENT_LINE.exec(analysis);
  if (!match) return null;

  const [heightCm, widthCm, ink, difficulty] = match.slice(1, 5).map(Number);
  if ([heightCm, widthCm, ink, difficulty].some((n) => !Number.isFinite(n) || n < 0)) {
    return null;
  }

  return { heightCm, widthCm, ink, difficulty };
}

function floorTo(value: number, step: number): number {
  // epsilon absorbs float noise such as 44.99999999
  return Math.floor(value / step + 1e-9) * step;
}

export function priceTattoo(m: TattooMeasurement): number {
  const raw = m.heightCm * m.widthCm * m.difficulty * (1 + INK_MULTIPLIER * m.ink);
  return Math.max(MIN_PRICE, floorTo(raw, ROUNDING));
}

export function quoteTattoos(measurements: TattooMeasurement[]): Quote | null {
  if (measurements.length === 0) return null;

  if (measurements.length === 1) {
    const low = priceTattoo(measurements[0]);
    const high = low < 90 ? low + 5 : low + 10;
    return { kind: 'single', low, high };
  }

  const sum = measurements.reduce((acc, m) => acc + priceTattoo(m), 0);
  const total = floorTo(sum * (1 - MULTI_TATTOO_DISCOUNT), ROUNDING);
  return { kind: 'multiple', total, count: measurements.length };
}

export function quoteFromAnalyses(analyses: string[]): Quote | null {
  const measurements = analyses
    .map(parseMeasurement)
    .filter((m): m is TattooMeasurement => m !== null);
  return quoteTattoos(measurements);
}
