/**
 * API Client Service
 *
 * Owns the connection settings used by the HTTP layer:
 * - Server base URL
 * - Access token (obtained elsewhere; this service never logs in)
 * - Configurable per-request timeout
 * - Notifying subscribers when the connection settings change
 */

import { getDefaultTimeoutMs } from "@/lib/config";
import { logger } from "@/lib/logger";

const log = logger.forTag("api:client");

type ConnectionListener = () => void;

export interface ApiClientOptions {
  baseUrl?: string | null;
  accessToken?: string | null;
  timeout?: number;
}

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/$/, "");
}

export class ApiClientService {
  private baseUrl: string | null = null;
  private accessToken: string | null = null;
  private listeners: Set<ConnectionListener> = new Set();
  private timeout: number;

  constructor(options: ApiClientOptions = {}) {
    this.baseUrl = options.baseUrl ? normalizeBaseUrl(options.baseUrl) : null;
    this.accessToken = options.accessToken ?? null;
    this.timeout = options.timeout ?? getDefaultTimeoutMs();
  }

  /**
   * Subscribe to connection setting changes
   * @returns Unsubscribe function
   */
  subscribe(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notifyListeners(): void {
    this.listeners.forEach((listener) => listener());
  }

  getBaseUrl(): string | null {
    return this.baseUrl;
  }

  getAccessToken(): string | null {
    return this.accessToken;
  }

  /**
   * Check if configured (has both baseUrl and accessToken)
   */
  isAuthenticated(): boolean {
    return !!this.baseUrl && !!this.accessToken;
  }

  setBaseUrl(url: string): void {
    this.baseUrl = normalizeBaseUrl(url);
    this.notifyListeners();
  }

  setAccessToken(accessToken: string | null): void {
    log.info(accessToken ? "Updating access token" : "Clearing access token");
    this.accessToken = accessToken;
    this.notifyListeners();
  }

  getTimeout(): number {
    return this.timeout;
  }

  setTimeout(timeout: number): void {
    this.timeout = timeout;
  }

  /**
   * Create an AbortController that aborts after the configured duration
   *
   * Callers must clear the returned timeoutId once the request settles.
   */
  createTimeoutSignal(customTimeout?: number): {
    controller: AbortController;
    timeoutId: ReturnType<typeof setTimeout>;
  } {
    const timeout = customTimeout ?? this.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    return { controller, timeoutId };
  }
}
