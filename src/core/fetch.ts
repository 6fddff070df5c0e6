import { Agent, fetch as undiciFetch } from "undici";
import type { Dispatcher } from "undici";

export interface FetchInit {
  method?: "GET";
  headers: Record<string, string>;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
}

/** The slice of a fetch response the extractor reads. */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  url: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface TimedExchange<T> {
  response: FetchResponseLike;
  /** Read only for 2xx responses. */
  body: T | undefined;
}

/**
 * Runs the request and, for a 2xx response, `readBody` under one deadline.
 * When the deadline passes the request is aborted and the call rejects, even
 * if the body stream never settles.
 */
export async function fetchWithTimeout<T>(
  fetchFn: FetchLike,
  url: string,
  init: Omit<FetchInit, "signal">,
  timeoutMs: number,
  readBody: (response: FetchResponseLike) => Promise<T>,
): Promise<TimedExchange<T>> {
  const controller = new AbortController();
  let timeout: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      controller.abort();
      reject(new Error(`request timed out after ${timeoutMs} ms`));
    }, timeoutMs);
  });

  const exchange = async (): Promise<TimedExchange<T>> => {
    const response = await fetchFn(url, { ...init, signal: controller.signal });
    const body = response.ok ? await readBody(response) : undefined;
    return { response, body };
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } finally {
    clearTimeout(timeout);
  }
}
