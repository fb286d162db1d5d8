import { SpeedtestResults, SpeedtestServer } from '../types/SpeedTypes';

/**
 * What the sampler needs from a speed-test backend. Throughput is reported in
 * bits per second; failures are thrown as `SpeedtestError` subclasses.
 */
export interface SpeedtestClient {
  readonly results: SpeedtestResults;
  getBestServer(): Promise<SpeedtestServer>;
  download(): Promise<number>;
  upload(): Promise<number>;
}
