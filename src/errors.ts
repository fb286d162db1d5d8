export class SpeedtestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigRetrievalError extends SpeedtestError {}

export class ServersRetrievalError extends SpeedtestError {}

export class NoMatchedServersError extends SpeedtestError {
  constructor(message = 'No matched servers') {
    super(message);
  }
}

export class BestServerFailureError extends SpeedtestError {}

export class SamplerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SamplerConfigError';
  }
}

export type SamplerFailure =
  | { kind: 'config-retrieval' }
  | { kind: 'no-matched-servers' }
  | { kind: 'servers-retrieval' }
  | { kind: 'speedtest'; message: string }
  | { kind: 'invalid-config'; message: string }
  | { kind: 'unexpected'; message: string; error: unknown };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps anything thrown while sampling onto the closed set of failures the
 * CLI knows how to report. Subclasses are checked before `SpeedtestError`.
 */
export function classifyFailure(error: unknown): SamplerFailure {
  if (error instanceof ConfigRetrievalError) {
    return { kind: 'config-retrieval' };
  }
  if (error instanceof NoMatchedServersError) {
    return { kind: 'no-matched-servers' };
  }
  if (error instanceof ServersRetrievalError) {
    return { kind: 'servers-retrieval' };
  }
  if (error instanceof SpeedtestError) {
    return { kind: 'speedtest', message: error.message };
  }
  if (error instanceof SamplerConfigError) {
    return { kind: 'invalid-config', message: error.message };
  }
  return { kind: 'unexpected', message: errorMessage(error), error };
}

export function describeFailure(failure: SamplerFailure): string {
  switch (failure.kind) {
    case 'config-retrieval':
      return 'Error: Unable to retrieve configuration from Speedtest.net.';
    case 'no-matched-servers':
      return 'Error: No matched servers for testing.';
    case 'servers-retrieval':
      return 'Error: Unable to retrieve speed test server list.';
    case 'speedtest':
      return `Speedtest failed: ${failure.message}`;
    case 'invalid-config':
      return `Error: Invalid configuration: ${failure.message}`;
    case 'unexpected':
      return `An unexpected error occurred: ${failure.message}`;
  }
}
