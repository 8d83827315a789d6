import { log } from '../../lib/logger';

describe('log', () => {
  it('should time an operation in milliseconds', async () => {
    const timer = log.startTimer('install');
    await new Promise<void>(resolve => setTimeout(resolve, 20));

    const durationMs = timer.done({ sessionId: 'abc' });

    expect(durationMs).toBeGreaterThanOrEqual(15);
    expect(durationMs).toBeLessThan(5000);
  });

  it('should accept a plain string as metadata', () => {
    expect(() => log.session('Opening', 'session abc')).not.toThrow();
    expect(() => log.debugFor('nft', 'No matching rule to delete', { chain: 'PREROUTING' })).not.toThrow();
  });
});
