import { Controller, Get } from '@nestjs/common';
import { SERVICE_NAME } from './config/feeds.constants';
import { FeedPipelineService } from './services/feed-pipeline.service';
import { PipelineStatus } from './types/feeds.types';

@Controller()
export class FeedsController {
  constructor(private readonly feedPipelineService: FeedPipelineService) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Get('status')
  getStatus(): PipelineStatus {
    return this.feedPipelineService.getStatus();
  }
}
