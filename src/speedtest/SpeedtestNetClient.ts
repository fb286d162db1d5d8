import { EventEmitter } from 'events';
import speedTest from 'speedtest-net';
import { z } from 'zod';
import {
  BestServerFailureError,
  ConfigRetrievalError,
  NoMatchedServersError,
  ServersRetrievalError,
  SpeedtestError
} from '../errors';
import { SpeedtestResults, SpeedtestServer } from '../types/SpeedTypes';
import { SpeedtestClient } from './SpeedtestClient';

export type SpeedTestRunner = (options: speedTest.Options) => EventEmitter;

export interface SpeedtestNetOptions {
  maxTime: number; // ms per download/upload phase
  pingCount: number;
}

const BITS_PER_MEGABIT = 1_000_000;

const DataSchema = z.object({
  speeds: z.object({
    download: z.number().nonnegative(),
    upload: z.number().nonnegative()
  }),
  client: z.object({
    ip: z.string(),
    isp: z.string()
  }),
  server: z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    host: z.string(),
    location: z.string(),
    country: z.string(),
    sponsor: z.string(),
    distance: z.number().optional(),
    ping: z.number().nonnegative()
  })
});

type Measurement = z.infer<typeof DataSchema>;

const ServerEntrySchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) });

// Which step of a run was in flight when it failed
type Phase = 'config' | 'servers' | 'best-server' | 'transfer';

function failureFor(phase: Phase, cause: unknown): SpeedtestError {
  const message = cause instanceof Error ? cause.message : String(cause);
  switch (phase) {
    case 'config':
      return new ConfigRetrievalError(message, { cause });
    case 'servers':
      return new ServersRetrievalError(message, { cause });
    case 'best-server':
      return new BestServerFailureError(message, { cause });
    case 'transfer':
      return new SpeedtestError(message, { cause });
  }
}

/**
 * `SpeedtestClient` on top of speedtest-net. Every library run measures
 * latency, download and upload in one go, so discovery keeps its run for the
 * first round and later rounds start a fresh run pinned to the same server.
 * `upload()` hands back the figure measured by the preceding `download()`.
 */
export class SpeedtestNetClient implements SpeedtestClient {
  public readonly results: SpeedtestResults = {
    ping: 0,
    download: 0,
    upload: 0,
    server: null,
    client: null
  };

  private unused: Measurement | null = null;
  private pendingUploadBps: number | null = null;

  constructor(
    private readonly options: SpeedtestNetOptions,
    private readonly runner: SpeedTestRunner = speedTest
  ) {}

  public async getBestServer(): Promise<SpeedtestServer> {
    const measurement = await this.measure();
    const server: SpeedtestServer = {
      id: measurement.server.id,
      name: measurement.server.location,
      country: measurement.server.country,
      sponsor: measurement.server.sponsor,
      host: measurement.server.host,
      distanceKm: measurement.server.distance,
      latencyMs: measurement.server.ping
    };

    this.results.server = server;
    this.results.client = { ip: measurement.client.ip, isp: measurement.client.isp };
    this.results.ping = measurement.server.ping;
    this.unused = measurement;
    return server;
  }

  public async download(): Promise<number> {
    const server = this.results.server;
    if (!server) {
      throw new SpeedtestError('No server selected; call getBestServer() first');
    }

    const measurement = this.unused ?? (await this.measure(server.id));
    this.unused = null;

    this.results.download = measurement.speeds.download * BITS_PER_MEGABIT;
    this.pendingUploadBps = measurement.speeds.upload * BITS_PER_MEGABIT;
    return this.results.download;
  }

  public async upload(): Promise<number> {
    if (this.pendingUploadBps === null) {
      throw new SpeedtestError('No upload measured; call download() first');
    }

    this.results.upload = this.pendingUploadBps;
    this.pendingUploadBps = null;
    return this.results.upload;
  }

  private measure(serverId?: string): Promise<Measurement> {
    return new Promise((resolve, reject) => {
      let phase: Phase = 'config';
      let settled = false;

      const fail = (error: SpeedtestError): void => {
        if (!settled) {
          settled = true;
          reject(error);
        }
      };

      const test = this.runner({
        maxTime: this.options.maxTime,
        pingCount: this.options.pingCount,
        ...(serverId === undefined ? {} : { serverId })
      });

      test.on('config', () => {
        phase = 'servers';
      });
      test.on('servers', (servers: unknown) => {
        phase = 'best-server';
        if (!Array.isArray(servers)) {
          fail(new ServersRetrievalError('Malformed server list'));
          return;
        }
        // Entries without an id are skipped, not fatal
        const ids = servers.flatMap((entry: unknown) => {
          const parsed = ServerEntrySchema.safeParse(entry);
          return parsed.success ? [parsed.data.id] : [];
        });
        const candidates = serverId === undefined ? ids : ids.filter((id) => id === serverId);
        if (candidates.length === 0) {
          fail(new NoMatchedServersError());
        }
      });
      test.on('testserver', () => {
        phase = 'transfer';
      });
      test.on('error', (error: unknown) => {
        fail(failureFor(phase, error));
      });
      test.on('data', (data: unknown) => {
        const parsed = DataSchema.safeParse(data);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          fail(new SpeedtestError(`Malformed result: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`));
          return;
        }
        if (!settled) {
          settled = true;
          resolve(parsed.data);
        }
      });
    });
  }
}
