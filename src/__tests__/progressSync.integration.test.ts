/**
 * Integration test: createProgressSync wired to an in-memory database and a
 * stubbed fetch
 */

import { getMediaProgressRow } from '@/db/helpers/mediaProgress';
import { createProgressSync, type ProgressSync } from '@/index';
import { setShowSyncErrorNotifications } from '@/lib/appSettings';
import type { SyncNotifier } from '@/types/progress';
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { mockApiMediaProgress } from './fixtures';

type FetchFn = typeof fetch;

const requestUrl = (input: Parameters<FetchFn>[0]): string =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;

describe('createProgressSync', () => {
  const originalFetch = global.fetch;
  let fetchMock: jest.Mock<FetchFn>;
  let notifier: { notify: jest.Mock<SyncNotifier['notify']> };
  let sync: ProgressSync;

  beforeEach(() => {
    fetchMock = jest.fn<FetchFn>();
    global.fetch = fetchMock;
    notifier = { notify: jest.fn<SyncNotifier['notify']>() };
    sync = createProgressSync({
      baseUrl: 'https://abs.example.test',
      accessToken: 'test-token',
      databasePath: ':memory:',
      notifier,
      config: { maxRetries: 0, baseDelayMs: 1, timeoutMs: 500 },
    });
  });

  afterEach(() => {
    sync.close();
    global.fetch = originalFetch;
  });

  it('should apply the configuration overrides', () => {
    expect(sync.config).toEqual({ maxRetries: 0, baseDelayMs: 1, timeoutMs: 500 });
    expect(sync.apiClient.getTimeout()).toBe(500);
  });

  it('should upload newer local progress, adopt newer server progress and mirror the batch in the store', async () => {
    await sync.service.recordLocalProgress('li-local', 600, 5000);
    await sync.service.recordLocalProgress('li-remote', 100, 1000);

    fetchMock.mockImplementation(async (input, init) => {
      const url = requestUrl(input);
      if (init?.method === 'PATCH') {
        return new Response('OK', { status: 200 });
      }
      if (url.endsWith('/li-remote')) {
        return new Response(
          JSON.stringify({ ...mockApiMediaProgress, libraryItemId: 'li-remote', currentTime: 2400, lastUpdate: 9000 }),
          { status: 200 }
        );
      }
      return new Response('Not Found', { status: 404 });
    });

    const result = await sync.service.syncAllPending();

    expect(result).toEqual({ successCount: 2, failureCount: 0, errors: [] });

    const patches = fetchMock.mock.calls.filter(([, init]) => init?.method === 'PATCH');
    expect(patches).toHaveLength(1);
    expect(requestUrl(patches[0][0])).toBe('https://abs.example.test/api/me/progress/li-local');
    expect(patches[0][1]?.body).toBe('{"currentTime":600,"lastUpdate":5000}');

    expect(await getMediaProgressRow(sync.database.db, 'li-remote')).toEqual(
      expect.objectContaining({ currentTime: 2400, lastUpdate: 9000, pendingUpload: false })
    );
    expect(await getMediaProgressRow(sync.database.db, 'li-local')).toEqual(
      expect.objectContaining({ currentTime: 600, lastUpdate: 5000, pendingUpload: false })
    );

    const state = sync.store.getState().sync;
    expect(state.isSyncing).toBe(false);
    expect(state.lastResult).toEqual(result);
  });

  it('should keep progress recorded while the upload was in flight', async () => {
    await sync.service.recordLocalProgress('li-1', 100, 1000);
    fetchMock.mockImplementation(async (_input, init) => {
      if (init?.method === 'PATCH') {
        await sync.service.recordLocalProgress('li-1', 200, 2000);
        return new Response('OK', { status: 200 });
      }
      return new Response('Not Found', { status: 404 });
    });

    const result = await sync.service.syncAllPending();

    expect(result).toEqual({ successCount: 1, failureCount: 0, errors: [] });
    expect(await getMediaProgressRow(sync.database.db, 'li-1')).toEqual(
      expect.objectContaining({ currentTime: 200, lastUpdate: 2000, pendingUpload: true })
    );
  });

  it('should notify about a failed standalone sync only while enabled', async () => {
    fetchMock.mockImplementation(async () => new Response('Offline', { status: 503 }));
    const record = await sync.service.recordLocalProgress('li-1', 10, 1000);

    await expect(sync.service.syncItem(record)).resolves.toBe(false);
    expect(notifier.notify).toHaveBeenCalledWith('Failed to sync progress for li-1');

    notifier.notify.mockClear();
    await setShowSyncErrorNotifications(sync.database.db, false);

    await expect(sync.service.syncItem(record)).resolves.toBe(false);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should keep failed items pending with their error recorded', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify({ error: 'Unauthorized' }), { status: 401 }));
    await sync.service.recordLocalProgress('li-1', 10, 1000);

    const result = await sync.service.syncAllPending();

    expect(result).toEqual({ successCount: 0, failureCount: 1, errors: ['Failed to sync li-1'] });
    expect(await getMediaProgressRow(sync.database.db, 'li-1')).toEqual(
      expect.objectContaining({ pendingUpload: true, syncAttempts: 1, syncError: 'Failed to sync li-1' })
    );
    expect(sync.store.getState().sync.lastError).toBe('Failed to sync li-1');
  });
});
