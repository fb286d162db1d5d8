import Table from 'cli-table3';
import { ClientInfo, MetricSummary, RunSummary, Sample, SpeedtestServer } from '../types/SpeedTypes';

const LABEL_WIDTH = 20;
const MEAN_WIDTH = 10;
const STD_DEV_WIDTH = 20;

export const SEPARATOR = '-'.repeat(60);
export const COMPLETED_BANNER = '==================Test Completed=====================';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// Local time, YYYY-MM-DD HH:mm:ss
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

function formatRow(label: string, metric: MetricSummary): string {
  return (
    label.padEnd(LABEL_WIDTH) +
    metric.mean.toFixed(1).padStart(MEAN_WIDTH) +
    metric.stdDev.toFixed(2).padStart(STD_DEV_WIDTH)
  );
}

/**
 * Fixed-width summary: one row per metric with the mean to one decimal and
 * the standard deviation to two. Labels wider than their column push the row
 * right rather than being cut.
 */
export function formatSummaryReport(summary: RunSummary): string[] {
  return [
    '',
    `===== Internet Speed Test Results of ${summary.rounds} =====`,
    'Metric'.padEnd(LABEL_WIDTH) + 'Mean'.padStart(MEAN_WIDTH) + 'Std Dev'.padStart(STD_DEV_WIDTH),
    SEPARATOR,
    formatRow('Ping (ms)', summary.ping),
    formatRow('Download Speed (Mbps)', summary.download),
    formatRow('Upload Speed (Mbps)', summary.upload),
    COMPLETED_BANNER
  ];
}

export function formatSamplesTable(samples: readonly Sample[]): string {
  const table = new Table({
    head: ['Round', 'Ping (ms)', 'Download (Mbps)', 'Upload (Mbps)'],
    colAligns: ['left', 'right', 'right', 'right'],
    style: { head: [], border: [] }
  });

  samples.forEach((sample, index) => {
    table.push([
      String(index + 1),
      sample.pingMs.toFixed(2),
      sample.downloadMbps.toFixed(2),
      sample.uploadMbps.toFixed(2)
    ]);
  });

  return table.toString();
}

export function formatClientLine(client: ClientInfo): string {
  return `Testing from ${client.isp || 'unknown ISP'} (${client.ip})...`;
}

export function formatServerLine(server: SpeedtestServer): string {
  const distance = server.distanceKm !== undefined ? ` [${server.distanceKm.toFixed(2)} km]` : '';
  const latency = server.latencyMs !== undefined ? `${server.latencyMs.toFixed(3)} ms` : 'n/a';
  return `Hosted by ${server.sponsor} (${server.name}, ${server.country})${distance}: ${latency}`;
}
