/**
 * Audiobookshelf API Response Types
 * Based on documentation: https://api.audiobookshelf.org/
 *
 * Note: These types represent the API wire format and differ from the
 * ProgressRecord the sync core works with. Marshal them through
 * db/helpers/mediaProgress before use.
 */

export interface ApiMediaProgress {
  libraryItemId: string;
  currentTime: number;
  lastUpdate: number;
  id?: string;
  episodeId?: string | null;
  duration?: number;
  progress?: number;
  isFinished?: boolean;
  hideFromContinueListening?: boolean;
  startedAt?: number;
  finishedAt?: number | null;
}

/**
 * Body of PATCH /api/me/progress/:libraryItemId
 */
export interface ApiMediaProgressUpdate {
  currentTime: number;
  lastUpdate: number;
}

export interface ApiError {
  error: string;
  message?: string;
}
