import { ProviderError, type ProviderErrorKind } from "@switchboard/types";

export interface PostJsonOptions {
  provider: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function classifyStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408) return "timeout";
  if (status >= 500) return "unavailable";
  return "bad_response";
}

/**
 * POST a JSON body and return the parsed JSON response. Transport and HTTP
 * failures become ProviderError; an abort of `signal` is rethrown unchanged.
 */
export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { provider, url, body, headers, timeoutMs, signal } = options;
  signal?.throwIfAborted();

  const controller = new AbortController();
  const timeout = AbortSignal.timeout(timeoutMs);
  const onTimeout = () => controller.abort(timeout.reason);
  const onCancel = () => controller.abort(signal?.reason);
  timeout.addEventListener("abort", onTimeout, { once: true });
  signal?.addEventListener("abort", onCancel, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      if (timeout.aborted) {
        throw new ProviderError(provider, "timeout", `${provider} did not answer within ${timeoutMs}ms`, {
          cause: err,
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProviderError(provider, "unavailable", `Could not reach ${provider}: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new ProviderError(
        provider,
        classifyStatus(response.status),
        `${provider} API error ${response.status}${detail ? `: ${detail.slice(0, 500)}` : ""}`,
        { status: response.status },
      );
    }

    try {
      return await response.json();
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ProviderError(provider, "bad_response", `${provider} returned a body that is not JSON`, {
        cause: err,
        status: response.status,
      });
    }
  } finally {
    timeout.removeEventListener("abort", onTimeout);
    signal?.removeEventListener("abort", onCancel);
  }
}
