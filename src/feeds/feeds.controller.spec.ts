import { FeedsController } from './feeds.controller';
import { PipelineStatus } from './types/feeds.types';

function makeStatus(): PipelineStatus {
  return {
    cacheSize: 2,
    categories: { Italia: 1, USA: 1 },
    feeds: ['https://example.com/rss.xml'],
    lastCycle: {
      startedAt: '2026-02-16T00:00:00.000Z',
      feeds: 1,
      fetched: 2,
      classified: 2,
      skipped: 0,
      elapsedMs: 15,
      published: false,
    },
  };
}

describe('FeedsController', () => {
  const status = makeStatus();
  const pipeline = {
    getStatus: jest.fn().mockReturnValue(status),
  };
  const controller = new FeedsController(pipeline as never);

  it('reports liveness', () => {
    expect(controller.getHealth()).toEqual({
      status: 'ok',
      service: 'feed-categorizer',
    });
  });

  it('returns the pipeline status', () => {
    expect(controller.getStatus()).toBe(status);
    expect(pipeline.getStatus).toHaveBeenCalledTimes(1);
  });
});
