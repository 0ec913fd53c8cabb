import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ConfigService } from '../config/config.service.js';
import { FileScannerService } from '../scanner/file-scanner.service.js';
import type { ReportSink } from '../report/report-sink.js';
import { EndpointPool } from './endpoint-pool.js';
import { ResultAggregator, describeSummary } from './result-aggregator.js';
import type { ReviewUnit, RunResult } from './review.types.js';
import { WorkScheduler } from './work-scheduler.service.js';

export interface RunOptions {
  signal?: AbortSignal;
}

@Injectable()
export class ReviewService {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(FileScannerService) private readonly scanner: FileScannerService,
    @Inject(WorkScheduler) private readonly scheduler: WorkScheduler,
  ) {
    this.logger.setContext(ReviewService.name);
  }

  async reviewDirectory(
    directory: string,
    sink: ReportSink,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const { review } = this.configService.getConfig();
    this.logger.log(`Scanning directory: ${directory}`);
    const units = await this.scanner.scan(directory, {
      maxFileSize: review.maxFileSize,
      extensions: review.extensions,
      includeTests: review.includeTests,
      sensitivePatterns: review.sensitivePatterns,
    });
    if (units.length === 0) {
      this.logger.log('No files found to review');
      return {
        summary: {
          total: 0,
          succeeded: 0,
          failed: 0,
          failures: [],
          allSucceeded: true,
          durationMs: 0,
        },
        outcomes: [],
      };
    }
    this.logger.log(`Found ${units.length} files to review`);
    return this.reviewUnits(units, sink, options);
  }

  /** One run: a fresh endpoint pool and aggregator, shared by every task of this run only. */
  async reviewUnits(
    units: readonly ReviewUnit[],
    sink: ReportSink,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const id = `run-${randomUUID().slice(0, 8)}`;
    const { api, review } = this.configService.getConfig();
    const pool = EndpointPool.fromConfig(api);
    const aggregator = new ResultAggregator(sink);

    this.logger.log(
      `Starting ${id}: ${units.length} unit(s), ${pool.size} endpoint(s), concurrency ${review.concurrency}`,
    );
    const outcomes = await this.scheduler.runAll(units, {
      concurrency: review.concurrency,
      pool,
      maxUnitSize: review.maxFileSize,
      signal: options.signal,
      onOutcome: async (unit, outcome) => {
        if (outcome.status === 'failure') {
          this.logger.error(`Review failed for ${unit.path}: ${outcome.reason}`);
        }
        await aggregator.record(unit, outcome);
      },
    });

    const summary = aggregator.summarize();
    this.logger.log(`${id}: ${describeSummary(summary)} in ${summary.durationMs}ms`);
    return { summary, outcomes };
  }
}
