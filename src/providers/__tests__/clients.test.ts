/**
 * Client Factory Tests
 *
 * Constructing SDK clients makes no network calls.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { getRuntimeClient, getS3Client, resetClients } from '../clients.js';

describe('client factory', () => {
  afterEach(() => {
    resetClients();
  });

  it('reuses one client per region', () => {
    expect(getRuntimeClient('us-west-2')).toBe(getRuntimeClient('us-west-2'));
    expect(getRuntimeClient('us-east-1')).not.toBe(getRuntimeClient('us-west-2'));
  });

  it('pins the SDK to a single attempt', async () => {
    await expect(getRuntimeClient('us-west-2').config.maxAttempts()).resolves.toBe(1);
  });

  it('destroys and forgets clients on reset', () => {
    const runtime = getRuntimeClient('us-west-2');
    const s3 = getS3Client('us-west-2');
    const destroyRuntime = vi.spyOn(runtime, 'destroy');
    const destroyS3 = vi.spyOn(s3, 'destroy');

    resetClients();

    expect(destroyRuntime).toHaveBeenCalledTimes(1);
    expect(destroyS3).toHaveBeenCalledTimes(1);
    expect(getRuntimeClient('us-west-2')).not.toBe(runtime);
  });
});
