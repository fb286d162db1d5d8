export interface Sample {
  readonly pingMs: number;
  readonly downloadMbps: number;
  readonly uploadMbps: number;
}

export interface MetricSummary {
  mean: number;
  stdDev: number;
}

export interface RunSummary {
  rounds: number;
  ping: MetricSummary;
  download: MetricSummary;
  upload: MetricSummary;
}

export interface SpeedtestServer {
  id: string;
  name: string;
  country: string;
  sponsor: string;
  host: string;
  distanceKm?: number;
  latencyMs?: number;
}

export interface ClientInfo {
  ip: string;
  isp: string;
}

export interface SpeedtestResults {
  ping: number; // ms
  download: number; // bits per second
  upload: number; // bits per second
  server: SpeedtestServer | null;
  client: ClientInfo | null;
}

export interface SamplerConfig {
  rounds: number;
  maxTimeMs: number;
  pingCount: number;
  showSamples: boolean;
}
