/**
 * Indicator series are aligned with their input: index i describes the bar at index i,
 * and bars before the warmup window hold NaN.
 */

export function sma(values: number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(Number.NaN);
  if (period <= 0 || values.length < period) return out;

  let sum = 0;
  for (let i = 0; i < values.length; i += 1) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/** EMA seeded with the SMA of the first `period` values. */
export function ema(values: number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(Number.NaN);
  if (period <= 0 || values.length < period) return out;

  const k = 2 / (period + 1);
  let seed = 0;
  for (let i = 0; i < period; i += 1) seed += values[i];
  let prev = seed / period;
  out[period - 1] = prev;

  for (let i = period; i < values.length; i += 1) {
    prev = values[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/** Wilder RSI. */
export function rsi(closes: number[], period = 14): number[] {
  const out = new Array<number>(closes.length).fill(Number.NaN);
  if (closes.length < period + 1) return out;

  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i += 1) {
    const diff = closes[i] - closes[i - 1];
    if (diff >= 0) gain += diff;
    else loss -= diff;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;
  out[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < closes.length; i += 1) {
    const diff = closes[i] - closes[i - 1];
    const g = diff > 0 ? diff : 0;
    const l = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + g) / period;
    avgLoss = (avgLoss * (period - 1) + l) / period;
    out[i] = toRsi(avgGain, avgLoss);
  }
  return out;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Elliott Wave Oscillator: spread between a fast and a slow SMA as a percentage of close.
 */
export function ewo(closes: number[], fastPeriod: number, slowPeriod: number): number[] {
  const fast = sma(closes, fastPeriod);
  const slow = sma(closes, slowPeriod);
  return closes.map((close, i) => {
    if (!Number.isFinite(fast[i]) || !Number.isFinite(slow[i]) || close === 0) return Number.NaN;
    return ((fast[i] - slow[i]) / close) * 100;
  });
}

/** Average true range of the latest bar as a percentage of its close. */
export function atrPct(highs: number[], lows: number[], closes: number[], period = 14): number | null {
  if (closes.length < period + 1) return null;
  let atr: number | null = null;
  for (let i = 1; i < closes.length; i += 1) {
    const tr = Math.max(highs[i] - lows[i], Math.abs(highs[i] - closes[i - 1]), Math.abs(lows[i] - closes[i - 1]));
    if (i <= period) {
      atr = (atr ?? 0) + tr;
      if (i === period) atr = (atr ?? 0) / period;
      continue;
    }
    atr = ((atr ?? 0) * (period - 1) + tr) / period;
  }
  const lastClose = closes[closes.length - 1];
  if (atr === null || lastClose <= 0) return null;
  return (atr / lastClose) * 100;
}

export function last(values: number[]): number {
  return values.length > 0 ? values[values.length - 1] : Number.NaN;
}
