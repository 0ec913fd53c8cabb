import { Module, ConsoleLogger, Scope } from '@nestjs/common';
import axios from 'axios';
import { USER_AGENT } from '../constants.js';
import { FileScannerService } from '../scanner/file-scanner.service.js';
import { ChatCompletionClient, HTTP_CLIENT } from './chat-completion.client.js';
import { FailoverDispatcher } from './failover-dispatcher.service.js';
import { ReviewService } from './review.service.js';
import { WorkScheduler } from './work-scheduler.service.js';

@Module({
  providers: [
    { provide: ConsoleLogger, useClass: ConsoleLogger, scope: Scope.TRANSIENT },
    {
      provide: HTTP_CLIENT,
      useFactory: () => axios.create({ headers: { 'User-Agent': USER_AGENT } }),
    },
    ChatCompletionClient,
    FailoverDispatcher,
    WorkScheduler,
    FileScannerService,
    ReviewService,
  ],
  exports: [ReviewService],
})
export class ReviewModule {}
