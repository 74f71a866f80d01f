import { marshalProgressRecordFromApi } from "@/db/helpers/mediaProgress";
import { fetchMediaProgress, updateMediaProgress } from "@/lib/api/endpoints";
import type { ApiClientService } from "@/services/ApiClientService";
import type { ProgressRecord, RemoteProgressClient } from "@/types/progress";

/**
 * RemoteProgressClient over the /api/me/progress endpoints.
 * Makes exactly one request per call; retries belong to the caller.
 */
export class ApiProgressClient implements RemoteProgressClient {
  constructor(private readonly client: ApiClientService) {}

  async fetch(itemId: string): Promise<ProgressRecord | null> {
    const progress = await fetchMediaProgress(this.client, itemId);
    return progress ? marshalProgressRecordFromApi(progress) : null;
  }

  async push(record: ProgressRecord): Promise<boolean> {
    await updateMediaProgress(this.client, record.itemId, {
      currentTime: record.elapsedSeconds,
      lastUpdate: record.lastUpdate,
    });
    return true;
  }
}
