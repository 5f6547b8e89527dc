import { WebhookTaskRunner } from '../../src';

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('WebhookTaskRunner', () => {
  it('should run submitted work apart from the caller', async () => {
    const runner = new WebhookTaskRunner();
    const seen: string[] = [];

    const id = runner.submit('acme:pay_1', async () => {
      seen.push('ran');
    });
    seen.push('submitted');
    await runner.drain();

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    expect(seen).toEqual(['submitted', 'ran']);
    expect(runner.getStatistics()).toEqual({
      inFlight: 0,
      completed: 1,
      failed: 0,
      timeoutMs: 120000,
    });
  });

  it('should contain task failures', async () => {
    const runner = new WebhookTaskRunner();

    runner.submit('acme:pay_1', async () => {
      throw new Error('status lookup failed');
    });
    await runner.drain();

    expect(runner.getStatistics()).toMatchObject({ completed: 0, failed: 1 });
  });

  it('should abort a task that outlives its deadline', async () => {
    const runner = new WebhookTaskRunner({ timeoutMs: 20 });
    const signals: AbortSignal[] = [];

    runner.submit('acme:pay_slow', (signal) => {
      signals.push(signal);
      return untilAborted(signal);
    });
    expect(runner.inFlight).toBe(1);
    await runner.drain();

    expect(signals.map((signal) => signal.aborted)).toEqual([true]);
    expect(runner.getStatistics()).toMatchObject({ inFlight: 0, failed: 1 });
  });

  it('should abort running work and refuse new work on shutdown', async () => {
    const runner = new WebhookTaskRunner();

    runner.submit('acme:pay_1', (signal) => untilAborted(signal));
    runner.submit('acme:pay_2', (signal) => untilAborted(signal));
    await runner.shutdown();

    expect(runner.getStatistics()).toMatchObject({ inFlight: 0, failed: 2 });
    expect(() => runner.submit('acme:pay_3', async () => undefined)).toThrow(
      'Webhook task runner is shut down',
    );
  });
});
