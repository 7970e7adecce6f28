import { Module } from '@nestjs/common';
import { CATEGORY_RULES, DEFAULT_CATEGORY_RULES } from './config/category-rules';
import { FeedsController } from './feeds.controller';
import { FeedCacheService } from './services/feed-cache.service';
import { FeedClassifierService } from './services/feed-classifier.service';
import { FeedListService } from './services/feed-list.service';
import { FeedPipelineService } from './services/feed-pipeline.service';
import { ExecFileGitRunner, GIT_RUNNER } from './services/git-runner';
import { GitSyncService } from './services/git-sync.service';
import { OpmlPublisherService } from './services/opml-publisher.service';
import { RssFeedService } from './services/rss-feed.service';

@Module({
  controllers: [FeedsController],
  providers: [
    { provide: CATEGORY_RULES, useValue: DEFAULT_CATEGORY_RULES },
    { provide: GIT_RUNNER, useClass: ExecFileGitRunner },
    FeedCacheService,
    FeedClassifierService,
    FeedListService,
    RssFeedService,
    OpmlPublisherService,
    GitSyncService,
    FeedPipelineService,
  ],
  exports: [FeedPipelineService, FeedClassifierService],
})
export class FeedsModule {}
