import { apiFetch } from "@/lib/api/api";
import { logger } from "@/lib/logger";
import type { ApiClientService } from "@/services/ApiClientService";
import type { ApiError, ApiMediaProgress, ApiMediaProgressUpdate } from "@/types/api";

const log = logger.forTag("api:endpoints");

function parseApiError(text: string): ApiError | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "error" in parsed && typeof parsed.error === "string") {
      const message = "message" in parsed && typeof parsed.message === "string" ? parsed.message : undefined;
      return { error: parsed.error, message };
    }
    return null;
  } catch {
    return null;
  }
}

function isApiMediaProgress(data: unknown): data is ApiMediaProgress {
  return (
    typeof data === "object" &&
    data !== null &&
    "libraryItemId" in data &&
    typeof data.libraryItemId === "string" &&
    "currentTime" in data &&
    typeof data.currentTime === "number" &&
    "lastUpdate" in data &&
    typeof data.lastUpdate === "number"
  );
}

export async function handleResponseError(response: Response, defaultMessage: string): Promise<void> {
  if (response.ok) return;

  const text = await response.clone().text();
  log.error(`${defaultMessage}: ${text}`);

  const apiError = parseApiError(text);
  if (apiError) {
    throw new Error(apiError.message || apiError.error || defaultMessage);
  }

  // Plain text bodies (e.g. "Not Found", "Offline") are used as-is
  const errorMessage = text?.trim() || `${defaultMessage} (HTTP ${response.status})`;
  log.warn(`Server returned non-JSON error response: ${errorMessage}`);
  throw new Error(errorMessage);
}

/**
 * Fetch media progress for a library item from the server
 * @returns The server's progress, or null when the item has never been played
 */
export async function fetchMediaProgress(
  client: ApiClientService,
  libraryItemId: string
): Promise<ApiMediaProgress | null> {
  const response = await apiFetch(client, `/api/me/progress/${encodeURIComponent(libraryItemId)}`);
  if (response.status === 404) {
    log.debug(`No server progress for ${libraryItemId}`);
    return null;
  }
  await handleResponseError(response, "Failed to fetch media progress");

  const data: unknown = await response.json();
  if (!isApiMediaProgress(data)) {
    throw new Error(`Malformed media progress response for ${libraryItemId}`);
  }
  return data;
}

/**
 * Update media progress on the server
 */
export async function updateMediaProgress(
  client: ApiClientService,
  libraryItemId: string,
  update: ApiMediaProgressUpdate
): Promise<void> {
  const response = await apiFetch(client, `/api/me/progress/${encodeURIComponent(libraryItemId)}`, {
    method: "PATCH",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      currentTime: update.currentTime,
      lastUpdate: update.lastUpdate,
    }),
  });

  await handleResponseError(response, "Failed to update media progress");
}
