import { HealthController } from '../src/controllers/health.controller';
import { PollerStats } from '../src/services/poller.service';

describe('HealthController', () => {
  const now = () => new Date('2026-01-15T10:00:00.000Z');

  function controller(stats: PollerStats): HealthController {
    return new HealthController({
      pollerStats: () => stats,
      conversationCount: () => 4,
      processedMessageCount: () => 17
    }, now);
  }

  it('reports a polling bot as healthy', () => {
    const stats: PollerStats = {
      running: true,
      polls: 120,
      notifications: 17,
      fetchFailures: 1,
      lastPollAt: '2026-01-15T09:59:59.000Z'
    };

    expect(controller(stats).report()).toEqual({
      statusCode: 200,
      body: {
        success: true,
        status: 'polling',
        poller: stats,
        conversations: 4,
        processedMessages: 17,
        timestamp: '2026-01-15T10:00:00.000Z'
      }
    });
  });

  it('answers 503 once the poller stopped', () => {
    const report = controller({ running: false, polls: 0, notifications: 0, fetchFailures: 0, lastPollAt: null }).report();

    expect(report.statusCode).toBe(503);
    expect(report.body.status).toBe('stopped');
  });
});
