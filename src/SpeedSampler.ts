import { EventEmitter } from 'events';
import { SpeedtestClient } from './speedtest/SpeedtestClient';
import { Sample } from './types/SpeedTypes';

const BITS_PER_MEGABIT = 1_000_000;

export function toMbps(bitsPerSecond: number): number {
  return bitsPerSecond / BITS_PER_MEGABIT;
}

/**
 * Runs `rounds` ping/download/upload measurements against one server and
 * hands back the samples in round order. Any client error aborts the run.
 *
 * Emits `server` (SpeedtestServer) once the server is chosen and `sample`
 * (Sample, round) after every round.
 */
export class SpeedSampler extends EventEmitter {
  constructor(
    private readonly client: SpeedtestClient,
    private readonly rounds: number
  ) {
    super();
    if (!Number.isInteger(rounds) || rounds < 1) {
      throw new RangeError(`Rounds must be a positive integer, got ${rounds}`);
    }
  }

  public async run(): Promise<readonly Sample[]> {
    const server = await this.client.getBestServer();
    this.emit('server', server);

    const samples: Sample[] = [];
    for (let round = 1; round <= this.rounds; round++) {
      const pingMs = this.client.results.ping;
      const downloadBps = await this.client.download();
      const uploadBps = await this.client.upload();

      const sample: Sample = Object.freeze({
        pingMs,
        downloadMbps: toMbps(downloadBps),
        uploadMbps: toMbps(uploadBps)
      });
      samples.push(sample);
      this.emit('sample', sample, round);
    }

    return Object.freeze(samples);
  }
}
