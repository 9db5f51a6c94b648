export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * One reusable request handle (a browser tab, an HTTP client).
 * A session serves one request at a time.
 */
export interface TransportSession {
  /**
   * Rejects with a TransportError on connection failure or timeout.
   * Non-2xx statuses resolve normally; callers decide what they mean.
   */
  fetch(url: string, timeoutMs: number): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface Transport {
  open(): Promise<TransportSession>;
}

export interface CaptureOptions {
  match: (url: string) => boolean;      // Which network responses to inspect
  accept: (body: unknown) => boolean;   // Whether an inspected JSON body is the one wanted
  waitMs?: number;
  timeoutMs?: number;
}

/**
 * A browser-backed transport that can also listen for the JSON responses a
 * page fetches on its own while loading.
 */
export interface BrowserLike extends Transport {
  captureJson(url: string, options: CaptureOptions): Promise<unknown>;
}
