import type { BenchmarkBand } from './reporting.types.js';

const IQR_MULTIPLIER = 1.5;
const MIN_OBSERVATIONS_FOR_TRIMMING = 4;
export const BENCHMARK_TOLERANCE_PERCENT = 10;

const sortAscending = (values: number[]) => [...values].sort((a, b) => a - b);

export const mean = (values: number[]): number => {
  if (!values.length) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const median = (values: number[]): number => {
  if (!values.length) {
    return 0;
  }
  const sorted = sortAscending(values);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
};

// Linear interpolation between closest ranks.
export const quantile = (values: number[], probability: number): number => {
  if (!values.length) {
    return 0;
  }
  const sorted = sortAscending(values);
  const position = (sorted.length - 1) * Math.min(Math.max(probability, 0), 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

export const removeOutliersIqr = (values: number[]): number[] => {
  if (values.length < MIN_OBSERVATIONS_FOR_TRIMMING) {
    return values;
  }
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  const spread = q3 - q1;
  const lowerBound = q1 - IQR_MULTIPLIER * spread;
  const upperBound = q3 + IQR_MULTIPLIER * spread;
  return values.filter((value) => value >= lowerBound && value <= upperBound);
};

/**
 * Mean after discarding observations outside [Q1 - 1.5 IQR, Q3 + 1.5 IQR]. Falls back to the
 * untrimmed mean when trimming leaves nothing.
 */
export const robustMean = (values: number[]): number => {
  const kept = removeOutliersIqr(values);
  return kept.length ? mean(kept) : mean(values);
};

export const percentage = (numerator: number, denominator: number): number =>
  denominator > 0 ? (numerator / denominator) * 100 : 0;

export const perUnit = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

export const resolveBenchmarkBand = (
  value: number,
  reference: number,
  tolerancePercent = BENCHMARK_TOLERANCE_PERCENT
): BenchmarkBand => {
  if (!reference) {
    return 'unrated';
  }
  const difference = ((value - reference) / reference) * 100;
  if (difference > tolerancePercent) {
    return 'above';
  }
  if (difference < -tolerancePercent) {
    return 'below';
  }
  return 'normal';
};

export const percentChange = (from: number, to: number): number | null => {
  if (from === 0) {
    return null;
  }
  return ((to - from) / from) * 100;
};
