import { formatBytes } from "@/lib/helpers/formatters";
import { logger } from "@/lib/logger";
import type { ApiClientService } from "@/services/ApiClientService";

const log = logger.forTag("api:fetch");
const detailedLog = logger.forTag("api:fetch:detailed");

const USER_AGENT = `abs-progress-sync/0.1.0 (Node.js ${process.versions.node})`;

// Detailed request/response dumps are opt-in
logger.disableTag("api:fetch:detailed");

// Statuses whose Response must be constructed without a body
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

function resolveUrl(client: ApiClientService, input: string): string {
  if (/^https?:\/\//i.test(input)) return input;
  const base = client.getBaseUrl();
  if (!base) return input;
  if (input.startsWith("/")) return `${base}${input}`;
  return `${base}/${input}`;
}

export type ApiFetchOptions = Omit<RequestInit, "signal"> & {
  auth?: boolean;
  timeout?: number; // Optional timeout in milliseconds
};

export async function apiFetch(
  client: ApiClientService,
  pathOrUrl: string,
  init?: ApiFetchOptions
): Promise<Response> {
  const url = resolveUrl(client, pathOrUrl);
  const { auth = true, timeout, headers, ...rest } = init || {};
  const token = client.getAccessToken();

  const headerObj: Record<string, string> = { Accept: "application/json" };
  mergeHeaders(headerObj, headers);

  if (auth && token) {
    headerObj["Authorization"] = `Bearer ${token}`;
  }

  const hasUserAgent = Object.keys(headerObj).some((key) => key.toLowerCase() === "user-agent");
  if (!hasUserAgent) {
    headerObj["User-Agent"] = USER_AGENT;
  }

  const { controller, timeoutId } = client.createTimeoutSignal(timeout);
  const effectiveTimeout = timeout ?? client.getTimeout();

  const method = (rest.method || "GET").toUpperCase();
  const startTime = Date.now();
  log.info(`-> ${method} ${scrubUrl(client, url)}`);
  detailedLog.info(
    `-> ${method} ${scrubUrl(client, url)} headers: ${JSON.stringify(redactHeaders(headerObj))} body: ${rest.body}`
  );

  try {
    const res = await fetch(url, { ...rest, headers: headerObj, signal: controller.signal });
    // The body is read under the same timeout as the headers
    const body = NULL_BODY_STATUSES.has(res.status) ? null : await untilAborted(res.arrayBuffer(), controller.signal);
    const duration = Date.now() - startTime;
    log.info(
      `<- ${res.status} ${method} ${scrubUrl(client, url)} [${formatBytes(body?.byteLength ?? 0)}] [${duration}ms] [${res.headers.get("content-type")}]`
    );
    if (res.status === 401) {
      log.warn("Access token rejected by server");
    }
    return new Response(body, { status: res.status, statusText: res.statusText, headers: res.headers });
  } catch (error) {
    if (controller.signal.aborted) {
      log.warn(`Request timed out after ${effectiveTimeout}ms: ${method} ${scrubUrl(client, url)}`);
      throw new Error(`Request timed out after ${effectiveTimeout}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new Error("Request aborted"));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("Request aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function mergeHeaders(target: Record<string, string>, source?: RequestInit["headers"]): void {
  if (!source) return;
  if (source instanceof Headers) {
    source.forEach((value, key) => {
      target[key] = value;
    });
    return;
  }
  if (Array.isArray(source)) {
    for (const [key, value] of source) {
      target[key] = value;
    }
    return;
  }
  Object.assign(target, source);
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    redacted[key] = key.toLowerCase() === "authorization" ? "<redacted>" : value;
  }
  return redacted;
}

function scrubUrl(client: ApiClientService, url: string): string {
  const host = client.getBaseUrl()?.split("://")[1];
  return host ? url.replace(host, "<base-url>") : url;
}
