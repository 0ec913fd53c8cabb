import { Module } from '@nestjs/common';
import { AiReviewConfigModule } from '../config/config.module.js';
import { ReviewModule } from '../review/review.module.js';
import { ReviewCommand } from './review.command.js';

@Module({
  imports: [AiReviewConfigModule, ReviewModule],
  providers: [ReviewCommand],
})
export class CliModule {}
