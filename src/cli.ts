import chalk from 'chalk';
import { summarize } from './analyzers/StatsAnalyzer';
import { loadConfig } from './config';
import { classifyFailure, describeFailure } from './errors';
import {
  formatClientLine,
  formatSamplesTable,
  formatServerLine,
  formatSummaryReport,
  formatTimestamp
} from './report/ReportFormatter';
import { SpeedSampler } from './SpeedSampler';
import { SpeedtestClient } from './speedtest/SpeedtestClient';
import { SpeedtestNetClient } from './speedtest/SpeedtestNetClient';
import { Sample, SamplerConfig, SpeedtestServer } from './types/SpeedTypes';

export interface SpeedTestCLIOptions {
  env?: NodeJS.ProcessEnv;
  createClient?: (config: SamplerConfig) => SpeedtestClient;
  now?: () => Date;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

function defaultClient(config: SamplerConfig): SpeedtestClient {
  return new SpeedtestNetClient({ maxTime: config.maxTimeMs, pingCount: config.pingCount });
}

export class SpeedTestCLI {
  private readonly env: NodeJS.ProcessEnv;
  private readonly createClient: (config: SamplerConfig) => SpeedtestClient;
  private readonly now: () => Date;

  constructor(options: SpeedTestCLIOptions = {}) {
    this.env = options.env ?? process.env;
    this.createClient = options.createClient ?? defaultClient;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs the whole test and resolves to the process exit code. Failures the
   * speed-test client reports resolve to 1; anything else is rethrown.
   */
  public async start(): Promise<number> {
    try {
      console.log(`Timestamp: ${formatTimestamp(this.now())}`);
      const config = loadConfig(this.env);
      const client = this.createClient(config);
      const sampler = new SpeedSampler(client, config.rounds);

      sampler.on('server', (server: SpeedtestServer) => {
        if (client.results.client) {
          console.log(chalk.gray(formatClientLine(client.results.client)));
        }
        console.log(chalk.gray(formatServerLine(server)));
      });
      sampler.on('sample', (sample: Sample, round: number) => {
        console.log(
          chalk.gray(
            `Round ${round}/${config.rounds}: ping ${sample.pingMs.toFixed(1)} ms, ` +
              `download ${sample.downloadMbps.toFixed(2)} Mbps, upload ${sample.uploadMbps.toFixed(2)} Mbps`
          )
        );
      });

      console.log(chalk.cyan('Fetching the best server based on ping...'));
      const samples = await sampler.run();
      const summary = summarize(samples);

      if (config.showSamples) {
        console.log(formatSamplesTable(samples));
      }

      formatSummaryReport(summary).forEach((line) => console.log(line));

      return EXIT_SUCCESS;
    } catch (error) {
      const failure = classifyFailure(error);
      console.error(chalk.red(describeFailure(failure)));

      if (failure.kind === 'unexpected') {
        throw error;
      }
      return EXIT_FAILURE;
    }
  }
}

/** Process entry: runs the CLI and sets the exit code, printing the trace of anything unexpected. */
export async function main(cli: SpeedTestCLI = new SpeedTestCLI()): Promise<void> {
  try {
    process.exitCode = await cli.start();
  } catch (error) {
    console.error(error);
    process.exitCode = EXIT_FAILURE;
  }
}
