/**
 * Tests for RetryingUploader
 */

import { beforeEach, describe, expect, it } from '@jest/globals';
import { makeProgressRecord } from '../../../__tests__/fixtures';
import {
  createInstantSleep,
  createMockRemote,
  InMemoryProgressStore,
  recordedDelays,
} from '../../../__tests__/utils/fakes';
import { RetryingUploader } from '../RetryingUploader';

describe('RetryingUploader', () => {
  let remote: ReturnType<typeof createMockRemote>;
  let store: InMemoryProgressStore;
  let wait: ReturnType<typeof createInstantSleep>;
  let uploader: RetryingUploader;

  const record = makeProgressRecord({ itemId: 'li-7', elapsedSeconds: 300, lastUpdate: 5000 });

  beforeEach(() => {
    remote = createMockRemote();
    store = new InMemoryProgressStore([record]);
    wait = createInstantSleep();
    uploader = new RetryingUploader({
      remote,
      store,
      policy: { maxRetries: 3, baseDelayMs: 1000 },
      sleep: wait,
    });
  });

  it('should upload once and clear the pending flag on success', async () => {
    remote.push.mockResolvedValue(true);

    const result = await uploader.uploadWithRetry(record);

    expect(result).toBe(true);
    expect(remote.push).toHaveBeenCalledTimes(1);
    expect(remote.push).toHaveBeenCalledWith(record);
    expect(await store.get('li-7')).toEqual({ ...record, pendingUpload: false });
  });

  it('should make 4 attempts with 1s, 2s, 4s waits when the server keeps rejecting', async () => {
    remote.push.mockResolvedValue(false);

    const result = await uploader.uploadWithRetry(record);

    expect(result).toBe(false);
    expect(remote.push).toHaveBeenCalledTimes(4);
    expect(recordedDelays(wait)).toEqual([1000, 2000, 4000]);
    expect((await store.get('li-7'))?.pendingUpload).toBe(true);
  });

  it('should treat thrown errors as failed attempts', async () => {
    remote.push.mockRejectedValue(new Error('Request timed out after 7000ms'));

    await expect(uploader.uploadWithRetry(record)).resolves.toBe(false);
    expect(remote.push).toHaveBeenCalledTimes(4);
  });

  it('should succeed on the third attempt after two failures', async () => {
    remote.push
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);

    const result = await uploader.uploadWithRetry(record);

    expect(result).toBe(true);
    expect(remote.push).toHaveBeenCalledTimes(3);
    expect(recordedDelays(wait)).toEqual([1000, 2000]);
    expect((await store.get('li-7'))?.pendingUpload).toBe(false);
  });

  it('should report failure when the confirmed record cannot be stored', async () => {
    remote.push.mockResolvedValue(true);
    store.put = async () => {
      throw new Error('disk full');
    };

    await expect(uploader.uploadWithRetry(record)).resolves.toBe(false);
    expect(remote.push).toHaveBeenCalledTimes(1);
  });

  it('should not write locally when the wait is aborted', async () => {
    remote.push.mockResolvedValue(false);
    const controller = new AbortController();
    wait.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error('Retry aborted');
    });

    const result = await uploader.uploadWithRetry(record, controller.signal);

    expect(result).toBe(false);
    expect(remote.push).toHaveBeenCalledTimes(1);
    expect(await store.get('li-7')).toEqual(record);
  });
});
