import { clamp } from '@tessera/shared/src/utils/math.js';

export interface ConfidenceReading {
  readonly value: number;
  readonly note?: string;
}

const PERCENT = /^(-?\d+(?:\.\d+)?)\s*%$/;

function toNumber(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw !== 'string') {
    return undefined;
  }
  const trimmed = raw.trim();
  const percent = PERCENT.exec(trimmed);
  if (percent) {
    return Number(percent[1]) / 100;
  }
  if (trimmed.length === 0) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/** Reads a model-reported confidence into [0, 1], noting any correction. */
export function readConfidence(raw: unknown): ConfidenceReading {
  const value = toNumber(raw);
  if (value === undefined) {
    return { value: 0, note: 'Confidence missing or not numeric; defaulted to 0' };
  }

  const bounded = clamp(value, 0, 1);
  if (bounded !== value) {
    return {
      value: bounded,
      note: `Confidence ${String(value)} outside [0, 1]; clamped to ${String(bounded)}`,
    };
  }
  return { value };
}
