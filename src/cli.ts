#!/usr/bin/env node
import 'reflect-metadata';
import { ConsoleLogger } from '@nestjs/common';
import { CommandFactory } from 'nest-commander';
import { CliModule } from './cli/cli.module.js';

const FRAMEWORK_CONTEXTS = new Set([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
]);

class CliLogger extends ConsoleLogger {
  log(message: unknown, context?: string): void {
    if (context && FRAMEWORK_CONTEXTS.has(context)) return;
    if (context) {
      super.log(message, context);
    } else {
      super.log(message);
    }
  }
}

async function bootstrap() {
  await CommandFactory.run(CliModule, { logger: new CliLogger() });
}
bootstrap().catch((err) => {
  console.error('Fatal error:', err);
  process.exitCode = 1;
});
