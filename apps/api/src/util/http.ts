import axios from "axios";

export const http = axios.create({
  timeout: 8000,
  headers: {
    "User-Agent": "carbon-counter-api/0.1",
    Accept: "application/json",
  },
});

export type FetchJsonOptions = {
  attempts: number; // including the first
  backoffMs: number; // grows linearly per attempt
  timeoutMs?: number;
};

const JSON_TYPE = /^application\/(?:[\w.-]+\+)?json\b/i;

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export function isRetryable(e: unknown): boolean {
  if (!axios.isAxiosError(e)) return false;
  const status = e.response?.status;
  return (
    e.code === "ECONNABORTED" || // timeout
    e.code === "ECONNRESET" ||
    (typeof status === "number" && status >= 500 && status < 600)
  );
}

/**
 * GETs a JSON document, retrying timeouts, resets and 5xx answers.
 * A 2xx answer with a non-JSON content type is an error and is not retried.
 */
export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<unknown> {
  const attempts = Math.max(1, opts.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      const res = await http.get<unknown>(url, { timeout: opts.timeoutMs });
      const type = String(res.headers["content-type"] ?? "");
      if (!JSON_TYPE.test(type)) throw new Error(`Expected JSON from ${url}, got ${type || "no content type"}`);
      return res.data;
    } catch (e) {
      if (!isRetryable(e) || attempt >= attempts) throw e;
      await sleep(opts.backoffMs * attempt);
    }
  }
}
