import { describe, expect, it } from 'vitest';

import { getCurrentTraceId, runWithSpan } from '@agenda/shared';

describe('runWithSpan', () => {
  it('exposes a trace id only inside the span', async () => {
    expect(getCurrentTraceId()).toBeUndefined();

    const traceId = await runWithSpan('outer', async () => getCurrentTraceId());

    expect(traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(getCurrentTraceId()).toBeUndefined();
  });

  it('keeps the trace id across nested spans', async () => {
    const [outer, inner] = await runWithSpan('outer', async () => {
      const nested = await runWithSpan('inner', async () => getCurrentTraceId());
      return [getCurrentTraceId(), nested];
    });

    expect(inner).toBe(outer);
  });

  it('rethrows the handler error', async () => {
    await expect(
      runWithSpan('failing', async () => {
        throw new Error('span failed');
      })
    ).rejects.toThrow('span failed');
  });
});
