import { Injectable } from '@nestjs/common';
import { SERVICE_NAME, SERVICE_VERSION } from './feeds/config/feeds.constants';
import { FeedClassifierService } from './feeds/services/feed-classifier.service';

@Injectable()
export class AppService {
  constructor(private readonly classifier: FeedClassifierService) {}

  getInfo(): { service: string; version: string; categories: string[] } {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      categories: this.classifier.labels,
    };
  }
}
