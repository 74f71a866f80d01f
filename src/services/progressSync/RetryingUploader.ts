/**
 * Retrying Uploader
 *
 * Pushes a progress record to the server, retrying failed attempts with
 * exponential backoff. A confirmed upload is persisted locally with
 * pendingUpload cleared before the call reports success.
 */

import { toError } from "@/lib/helpers/errors";
import { logger } from "@/lib/logger";
import { retryWithBackoff, type RetryPolicy, type SleepFn } from "@/lib/retry";
import type { LocalStore, ProgressRecord, RemoteProgressClient } from "@/types/progress";

const log = logger.forTag("RetryingUploader");

export interface RetryingUploaderDeps {
  remote: RemoteProgressClient;
  store: LocalStore;
  policy: RetryPolicy;
  sleep?: SleepFn;
}

export class RetryingUploader {
  private readonly remote: RemoteProgressClient;
  private readonly store: LocalStore;
  private readonly policy: RetryPolicy;
  private readonly sleep?: SleepFn;

  constructor(deps: RetryingUploaderDeps) {
    this.remote = deps.remote;
    this.store = deps.store;
    this.policy = deps.policy;
    this.sleep = deps.sleep;
  }

  /**
   * @returns true once the server accepted the record and the local copy is
   * marked as uploaded; false after every attempt failed. Never throws.
   */
  async uploadWithRetry(record: ProgressRecord, signal?: AbortSignal): Promise<boolean> {
    const outcome = await retryWithBackoff(
      async () => {
        const accepted = await this.remote.push(record);
        if (!accepted) {
          throw new Error(`Server rejected progress for ${record.itemId}`);
        }
      },
      {
        ...this.policy,
        label: `Upload progress for ${record.itemId}`,
        sleep: this.sleep,
        signal,
      }
    );

    if (!outcome.ok) {
      log.warn(`Giving up on upload for ${record.itemId} after ${outcome.attempts} attempt(s)`);
      return false;
    }

    try {
      await this.store.put({ ...record, pendingUpload: false });
    } catch (error) {
      log.error(`Uploaded ${record.itemId} but failed to persist local state`, toError(error));
      return false;
    }

    log.debug(`Uploaded ${record.itemId} at ${record.elapsedSeconds}s`);
    return true;
  }
}
