import { Command, CommandRunner, Option } from 'nest-commander';
import { Inject } from '@nestjs/common';
import { resolve } from 'node:path';
import { ReviewService } from '../review/review.service.js';
import { ConfigService, requiresApiKey } from '../config/config.service.js';
import type { ConfigOverrides } from '../config/config.types.js';
import {
  ConsoleReportSink,
  FileReportSink,
} from '../report/report-sink.js';
import type { ReportSink } from '../report/report-sink.js';
import { parsePositiveInt, printSummary } from './result-printer.js';

export interface ReviewCommandOptions {
  path?: string;
  url?: string;
  endpoint?: string[];
  apiKey?: string;
  model?: string;
  maxSize?: number;
  concurrency?: number;
  timeout?: number;
  includeTests?: boolean;
  output?: string;
  config?: string;
}

@Command({
  name: 'review',
  description: 'Review source files with an AI chat-completion endpoint',
  options: { isDefault: true },
})
export class ReviewCommand extends CommandRunner {
  constructor(
    @Inject(ReviewService) private readonly reviewService: ReviewService,
    @Inject(ConfigService) private readonly configService: ConfigService,
  ) {
    super();
  }

  async run(_params: string[], options: ReviewCommandOptions = {}): Promise<void> {
    await this.configService.loadConfig(options.config);
    const overrides: ConfigOverrides = {
      url: options.url,
      endpoints: options.endpoint,
      apiKey: options.apiKey,
      model: options.model,
      timeoutMs: options.timeout,
      maxFileSize: options.maxSize,
      concurrency: options.concurrency,
      includeTests: options.includeTests,
    };
    const config = this.configService.applyOverrides(overrides);

    if (!config.api.apiKey) {
      const hosted = [config.api.url, ...config.api.endpoints].find(requiresApiKey);
      if (hosted) {
        console.warn(`Warning: This API endpoint (${hosted}) likely requires an API key.`);
        console.warn('Use --api-key flag or set AIREVIEW_API_KEY environment variable.\n');
      }
    }

    const directory = resolve(options.path ?? process.cwd());
    const sink: ReportSink = options.output
      ? await FileReportSink.create(resolve(options.output))
      : new ConsoleReportSink();

    const controller = new AbortController();
    const abort = () => controller.abort();
    process.once('SIGINT', abort);
    process.once('SIGTERM', abort);

    console.log('\n=== AI Review ===\n');
    console.log(`Directory: ${directory}`);
    try {
      const { summary } = await this.reviewService.reviewDirectory(directory, sink, {
        signal: controller.signal,
      });
      printSummary(summary);
      if (!summary.allSucceeded) {
        process.exitCode = 1;
      }
    } finally {
      process.off('SIGINT', abort);
      process.off('SIGTERM', abort);
      await sink.close();
    }
  }

  @Option({ flags: '-p, --path <dir>', description: 'Path to the project directory for review (default: cwd)' })
  parsePath(val: string) { return val; }

  @Option({ flags: '-u, --url <url>', description: 'URL of the AI API endpoint (used when no --endpoint is given)' })
  parseUrl(val: string) { return val; }

  @Option({ flags: '-e, --endpoint <url>', description: 'Equivalent endpoint for round-robin failover (repeatable)' })
  parseEndpoint(val: string, previous: string[] = []) { return [...previous, val]; }

  @Option({ flags: '-k, --api-key <key>', description: 'API key for authentication (can also use AIREVIEW_API_KEY env var)' })
  parseApiKey(val: string) { return val; }

  @Option({ flags: '-m, --model <name>', description: 'AI model to use for code review' })
  parseModel(val: string) { return val; }

  @Option({ flags: '--max-size <bytes>', description: 'Maximum file size in bytes to process' })
  parseMaxSize(val: string) { return parsePositiveInt(val, '--max-size'); }

  @Option({ flags: '-c, --concurrency <n>', description: 'Maximum number of concurrent reviews' })
  parseConcurrency(val: string) { return parsePositiveInt(val, '--concurrency'); }

  @Option({ flags: '--timeout <ms>', description: 'Per-request timeout in milliseconds' })
  parseTimeout(val: string) { return parsePositiveInt(val, '--timeout'); }

  @Option({ flags: '--include-tests', description: 'Also review test files' })
  parseIncludeTests() { return true; }

  @Option({ flags: '--output <file>', description: 'Write the report to a file instead of stdout' })
  parseOutput(val: string) { return val; }

  @Option({ flags: '--config <path>', description: 'Config file path' })
  parseConfig(val: string) { return val; }
}
