import { asError, shuttleError } from "../errors.js";

export type TimedFetchInit = RequestInit & { timeoutMs?: number; where?: string };

/** Wrap fetch with timeout and location context for debugging. */
export async function timedFetch(url: string, init: TimedFetchInit = {}): Promise<Response> {
  const { timeoutMs, where, signal: outerSignal, ...rest } = init;
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const linkAbort = () => controller.abort();
  if (outerSignal) {
    if (outerSignal.aborted) controller.abort();
    else outerSignal.addEventListener("abort", linkAbort, { once: true });
  }

  try {
    if (timeoutMs && timeoutMs > 0) {
      timer = setTimeout(() => controller.abort(), timeoutMs);
    }
    return await fetch(url, { ...rest, signal: controller.signal });
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw shuttleError(
      "transport_error",
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`,
      { retryable: !isAbort || !outerSignal?.aborted, cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
    if (outerSignal) outerSignal.removeEventListener("abort", linkAbort);
  }
}
