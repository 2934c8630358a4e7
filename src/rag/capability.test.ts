import { afterEach, describe, expect, it, vi } from 'vitest';
import { callCapability, guardedCaptioner, guardedExpander, type CapabilityPolicy } from './capability.js';
import { CapabilityUnavailableError, NoDataError, ValidationError } from './errors.js';

const policy: CapabilityPolicy = { timeoutMs: 1000, retries: 2, backoffMs: 0 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('callCapability', () => {
  it('returns the operation result', async () => {
    await expect(callCapability('embedding', async () => [0.1, 0.2], policy)).resolves.toEqual([0.1, 0.2]);
  });

  it('retries reads and reports exhaustion as CapabilityUnavailableError', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi.fn(async () => {
      throw new Error('connection reset');
    });

    const call = callCapability('embedding', operation, policy);
    await expect(call).rejects.toBeInstanceOf(CapabilityUnavailableError);
    await expect(call).rejects.toThrow('embedding unavailable: connection reset');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry writes', async () => {
    const operation = vi.fn(async () => {
      throw new Error('disk full');
    });

    await expect(callCapability('vector_store', operation, policy, false)).rejects.toThrow(
      'vector_store unavailable: disk full'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('passes validation and no-data errors through without retrying', async () => {
    const invalid = vi.fn(async () => {
      throw new ValidationError('bad vector');
    });
    await expect(callCapability('embedding', invalid, policy)).rejects.toBeInstanceOf(ValidationError);
    expect(invalid).toHaveBeenCalledTimes(1);

    const empty = vi.fn(async () => {
      throw new NoDataError();
    });
    await expect(callCapability('vector_store', empty, policy)).rejects.toBeInstanceOf(NoDataError);
    expect(empty).toHaveBeenCalledTimes(1);
  });

  it('times out slow calls', async () => {
    const slow = () => new Promise<number>(() => {});
    await expect(callCapability('completion', slow, { timeoutMs: 10, retries: 0, backoffMs: 0 })).rejects.toThrow(
      'completion unavailable: completion call timed out after 10ms'
    );
  });
});

describe('guarded providers', () => {
  it('wraps captioning failures', async () => {
    const captioner = guardedCaptioner(
      {
        caption: async () => {
          throw new Error('vision model offline');
        },
      },
      { ...policy, retries: 0 }
    );

    await expect(
      captioner.caption({ data: new Uint8Array([1]), mediaType: 'image/png', filename: 'a.png' })
    ).rejects.toThrow('caption unavailable: vision model offline');
  });

  it('passes expansions through', async () => {
    const expander = guardedExpander({ expandQuery: async (query, count) => [`${query} ${count}`] }, policy);
    await expect(expander.expandQuery('cache', 2)).resolves.toEqual(['cache 2']);
  });
});
