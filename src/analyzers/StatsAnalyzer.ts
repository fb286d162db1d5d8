import { MetricSummary, RunSummary, Sample } from '../types/SpeedTypes';

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('mean requires at least one value');
  }
  return values.reduce((total, value) => total + value, 0) / values.length;
}

/**
 * Sample standard deviation (divisor N - 1). A single value has no spread,
 * so one round reports 0 instead of dividing by zero.
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('standard deviation requires at least one value');
  }
  if (values.length === 1) {
    return 0;
  }

  const avg = mean(values);
  const squares = values.reduce((total, value) => total + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

function describe(values: readonly number[]): MetricSummary {
  return {
    mean: mean(values),
    stdDev: standardDeviation(values)
  };
}

export function summarize(samples: readonly Sample[]): RunSummary {
  return {
    rounds: samples.length,
    ping: describe(samples.map((sample) => sample.pingMs)),
    download: describe(samples.map((sample) => sample.downloadMbps)),
    upload: describe(samples.map((sample) => sample.uploadMbps))
  };
}
