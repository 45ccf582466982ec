/**
 * Minimal HTTP capability consumed by the downloader.
 */
import { fetch, type Dispatcher } from "undici";

export interface HttpResponse {
  status: number;
  ok: boolean;
  contentType: string | null;
  body: string;
}

export interface HttpClient {
  /** GET `url`, rejecting on timeout or connection failure. */
  get(url: string, opts: { timeoutMs: number }): Promise<HttpResponse>;
}

export class UndiciHttpClient implements HttpClient {
  constructor(private readonly dispatcher?: Dispatcher) {}

  async get(url: string, opts: { timeoutMs: number }): Promise<HttpResponse> {
    const res = await fetch(url, {
      method: "GET",
      headers: { accept: "text/csv, */*" },
      signal: AbortSignal.timeout(opts.timeoutMs),
      ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
    });
    return {
      status: res.status,
      ok: res.ok,
      contentType: res.headers.get("content-type"),
      body: await res.text(),
    };
  }
}
