/**
 * HTTP transport for IMDb pages.
 *
 * IMDb rate-limits and soft-blocks scripted clients, so the default transport
 * behaves like a browser session: rotating user agents, a full browser header
 * set, cookies kept between requests and a randomized pause before each
 * request. Matching and validation only see the HttpTransport interface, so
 * tests swap in a fake with no network and no delay.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { DEFAULT_USER_AGENTS } from '../shared/config.js';

export interface TransportResponse {
  status: number;
  url: string;
  body: string;
}

export interface GetOptions {
  referer?: string;
  signal?: AbortSignal;
}

export interface HttpTransport {
  get(url: string, opts?: GetOptions): Promise<TransportResponse>;
}

export class ImdbHttpError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ImdbHttpError';
  }
}

// ──────────────────────────────────────────────────────────────────
// Cookies
// ──────────────────────────────────────────────────────────────────

/** Minimal per-host cookie store: name=value pairs, no path or expiry tracking */
export class CookieJar {
  private hosts = new Map<string, Map<string, string>>();

  store(url: string, setCookieHeaders: readonly string[]): void {
    if (setCookieHeaders.length === 0) return;
    const host = new URL(url).hostname;
    const jar = this.hosts.get(host) ?? new Map<string, string>();

    for (const header of setCookieHeaders) {
      const [pair, ...attrs] = header.split(';');
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      const expired = attrs.some(a => /^\s*max-age\s*=\s*0\s*$/i.test(a));
      if (expired || value === '') {
        jar.delete(name);
      } else {
        jar.set(name, value);
      }
    }
    this.hosts.set(host, jar);
  }

  header(url: string): string | undefined {
    const jar = this.hosts.get(new URL(url).hostname);
    if (!jar || jar.size === 0) return undefined;
    return [...jar].map(([k, v]) => `${k}=${v}`).join('; ');
  }
}

// ──────────────────────────────────────────────────────────────────
// Browser headers
// ──────────────────────────────────────────────────────────────────

function platformOf(userAgent: string): string {
  if (userAgent.includes('Windows')) return 'Windows';
  if (userAgent.includes('Macintosh')) return 'macOS';
  return 'Linux';
}

/** Header set a desktop Chromium browser sends for a top-level navigation */
export function buildBrowserHeaders(userAgent: string, referer?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'user-agent': userAgent,
    'accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'cache-control': 'no-cache',
    'pragma': 'no-cache',
    'upgrade-insecure-requests': '1',
    'sec-fetch-dest': 'document',
    'sec-fetch-mode': 'navigate',
    'sec-fetch-site': referer ? 'same-origin' : 'none',
    'sec-fetch-user': '?1',
  };

  const chrome = /Chrome\/(\d+)/.exec(userAgent);
  if (chrome) {
    const v = chrome[1];
    const brand = userAgent.includes('Edg/') ? 'Microsoft Edge' : 'Google Chrome';
    headers['sec-ch-ua'] = `"Chromium";v="${v}", "${brand}";v="${v}", "Not-A.Brand";v="99"`;
    headers['sec-ch-ua-mobile'] = '?0';
    headers['sec-ch-ua-platform'] = `"${platformOf(userAgent)}"`;
  }

  if (referer) headers['referer'] = referer;
  return headers;
}

// ──────────────────────────────────────────────────────────────────
// Fetch-backed transport
// ──────────────────────────────────────────────────────────────────

/** The slice of the fetch API the transport relies on */
export interface FetchResponseLike {
  status: number;
  url: string;
  headers: {
    getSetCookie?(): string[];
  };
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal; redirect: 'follow' }
) => Promise<FetchResponseLike>;

export interface BrowserTransportOptions {
  userAgents?: string[];
  minDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  random?: () => number;
}

export class BrowserTransport implements HttpTransport {
  private readonly userAgents: string[];
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly random: () => number;
  readonly cookies = new CookieJar();

  constructor(opts: BrowserTransportOptions = {}) {
    this.userAgents = opts.userAgents && opts.userAgents.length > 0 ? opts.userAgents : DEFAULT_USER_AGENTS;
    this.minDelayMs = opts.minDelayMs ?? 1000;
    this.maxDelayMs = Math.max(opts.maxDelayMs ?? 3000, this.minDelayMs);
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.fetchImpl = opts.fetch ?? fetch;
    this.random = opts.random ?? Math.random;
  }

  pickUserAgent(): string {
    const idx = Math.min(Math.floor(this.random() * this.userAgents.length), this.userAgents.length - 1);
    return this.userAgents[idx];
  }

  nextDelayMs(): number {
    return Math.round(this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs));
  }

  async get(url: string, opts: GetOptions = {}): Promise<TransportResponse> {
    const pause = this.nextDelayMs();
    if (pause > 0) await wait(pause, opts.signal);
    opts.signal?.throwIfAborted();

    const headers = buildBrowserHeaders(this.pickUserAgent(), opts.referer);
    const cookie = this.cookies.header(url);
    if (cookie) headers['cookie'] = cookie;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, { headers, signal: controller.signal, redirect: 'follow' });
      this.cookies.store(res.url || url, res.headers.getSetCookie?.() ?? []);
      return { status: res.status, url: res.url || url, body: await res.text() };
    } catch (err) {
      opts.signal?.throwIfAborted();
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new ImdbHttpError(`GET ${url} failed: ${reason}`, url);
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/** Sleep that rejects with the signal's own reason when aborted */
async function wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    signal?.throwIfAborted();
    throw err;
  }
}

// ──────────────────────────────────────────────────────────────────
// Page fetch with the soft-block retry
// ──────────────────────────────────────────────────────────────────

export interface FetchPageOptions extends GetOptions {
  softBlockRetryDelayMs?: number;
}

/**
 * GET a page and return its HTML. A 202 with an empty body is IMDb's soft
 * block: wait, then try exactly once more with the cookies the first response
 * set. Anything other than 2xx after that throws ImdbHttpError.
 */
export async function fetchPage(
  transport: HttpTransport,
  url: string,
  opts: FetchPageOptions = {}
): Promise<string> {
  const { softBlockRetryDelayMs = 2000, ...getOpts } = opts;

  let res = await transport.get(url, getOpts);
  if (res.status === 202) {
    if (softBlockRetryDelayMs > 0) await wait(softBlockRetryDelayMs, getOpts.signal);
    getOpts.signal?.throwIfAborted();
    res = await transport.get(url, getOpts);
  }

  if (res.status === 202) {
    throw new ImdbHttpError(`GET ${url} soft-blocked (202) after retry`, url, 202);
  }
  if (res.status < 200 || res.status >= 300) {
    throw new ImdbHttpError(`HTTP ${res.status} for ${url}`, url, res.status);
  }
  return res.body;
}
