import axios, { AxiosInstance } from 'axios';
import { HTMLElement, parse } from 'node-html-parser';
import { logger } from '../../config/logger.config';
import { metrics } from '../../services/metrics.service';
import {
  OperationAbortedException,
  TransportFailureException,
  throwIfAborted,
} from '../../utils/exceptions';
import { RequestThrottle, sleep } from './request-throttle';
import { RequestOptions } from './source-provider.types';

export interface HtmlLink {
  href: string;
  text: string;
}

export interface HtmlTableRow {
  /** Cell texts (th and td) in column order, whitespace collapsed */
  cells: string[];
  /** First link inside each cell */
  links: (HtmlLink | null)[];
  /** Row made only of th cells */
  isHeader: boolean;
}

export interface HtmlTable {
  id: string | null;
  /** Texts of the first header row */
  headers: string[];
  rows: HtmlTableRow[];
}

export interface HtmlPage {
  url: string;
  canonicalUrl: string | null;
  title: string;
  headings: string[];
  tables: HtmlTable[];
  links: HtmlLink[];
}

/**
 * HTML table transport: given a URL, the page's tables as ordered rows of
 * cell text. Resolves null when the page does not exist; throws
 * TransportFailureException for anything else that goes wrong.
 */
export interface PageSource {
  fetchPage(url: string, options?: RequestOptions): Promise<HtmlPage | null>;
}

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',
];

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Returns true for 5xx responses, timeouts and network-level errors.
 * 4xx responses are permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (axios.isCancel(error)) return false;

  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;
  if (error.message?.includes('timeout')) return true;

  const status = error.response?.status;
  return status !== undefined && status >= 500;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function elementChildren(element: HTMLElement): HTMLElement[] {
  return element.childNodes.filter((node): node is HTMLElement => node instanceof HTMLElement);
}

function linkOf(element: HTMLElement): HtmlLink | null {
  const anchor = element.tagName === 'A' ? element : element.querySelector('a');
  if (!anchor) return null;
  const href = anchor.getAttribute('href');
  return href ? { href, text: collapse(anchor.text) } : null;
}

function parseTable(table: HTMLElement): HtmlTable {
  const rows: HtmlTableRow[] = [];
  let headers: string[] = [];

  for (const tr of table.querySelectorAll('tr')) {
    const cellElements = elementChildren(tr).filter(
      (child) => child.tagName === 'TD' || child.tagName === 'TH'
    );
    if (cellElements.length === 0) continue;

    const isHeader = cellElements.every((cell) => cell.tagName === 'TH');
    const row: HtmlTableRow = {
      cells: cellElements.map((cell) => collapse(cell.text)),
      links: cellElements.map(linkOf),
      isHeader,
    };
    if (isHeader && headers.length === 0) headers = row.cells;
    rows.push(row);
  }

  return { id: table.getAttribute('id') ?? null, headers, rows };
}

/**
 * Parse a page into tables and links. Tables shipped inside HTML comments
 * (rendered client-side by some sites) are parsed as well.
 */
export function parseHtmlPage(html: string, url: string): HtmlPage {
  const uncommented = html.replace(/<!--([\s\S]*?)-->/g, (_match, body: string) =>
    body.includes('<table') ? body : ''
  );
  const root = parse(uncommented);

  return {
    url,
    canonicalUrl: root.querySelector('link[rel="canonical"]')?.getAttribute('href') ?? null,
    title: collapse(root.querySelector('title')?.text ?? ''),
    headings: root.querySelectorAll('h1').map((heading) => collapse(heading.text)),
    tables: root.querySelectorAll('table').map(parseTable),
    links: root
      .querySelectorAll('a')
      .map(linkOf)
      .filter((link): link is HtmlLink => link !== null),
  };
}

export interface HtmlPageClientOptions {
  /** Source tag used in logs, metrics and errors */
  source: string;
  throttle: RequestThrottle;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  userAgents?: string[];
  /** Injected for tests; created with axios.create otherwise */
  http?: AxiosInstance;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * PageSource over HTTP. Every request (retries included) waits its turn on
 * the provider's throttle and carries the next user agent in rotation.
 */
export class HtmlPageClient implements PageSource {
  private readonly http: AxiosInstance;
  private readonly source: string;
  private readonly throttle: RequestThrottle;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly userAgents: string[];
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private nextAgent = 0;

  constructor(options: HtmlPageClientOptions) {
    this.source = options.source;
    this.throttle = options.throttle;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRetries = options.maxRetries ?? 2;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.userAgents = options.userAgents?.length ? options.userAgents : DEFAULT_USER_AGENTS;
    this.sleep = options.sleep ?? sleep;
    this.http =
      options.http ??
      axios.create({
        timeout: this.timeoutMs,
        responseType: 'text',
        maxRedirects: 5,
        headers: {
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
          'Cache-Control': 'no-cache',
        },
      });
  }

  async fetchPage(url: string, options: RequestOptions = {}): Promise<HtmlPage | null> {
    const { signal } = options;
    const html = await this.withRetry(
      () => this.throttle.schedule(() => this.getOnce(url, signal), signal),
      url,
      signal
    );
    if (html === null) return null;

    try {
      return parseHtmlPage(html, url);
    } catch (error) {
      throw TransportFailureException.malformed(
        this.source,
        url,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private currentUserAgent(): string {
    const agent = this.userAgents[this.nextAgent % this.userAgents.length];
    this.nextAgent = (this.nextAgent + 1) % this.userAgents.length;
    return agent;
  }

  private async getOnce(url: string, signal?: AbortSignal): Promise<string | null> {
    const started = Date.now();
    logger.debug('Fetching page', { source: this.source, url });

    try {
      const response = await this.http.get<string>(url, {
        signal,
        timeout: this.timeoutMs,
        responseType: 'text',
        headers: { 'User-Agent': this.currentUserAgent() },
      });
      metrics.increment(`fetch.${this.source}.ok`);
      if (typeof response.data !== 'string') {
        throw TransportFailureException.malformed(this.source, url, 'response body is not text');
      }
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && (error.response?.status === 404 || error.response?.status === 410)) {
        metrics.increment(`fetch.${this.source}.missing`);
        return null;
      }
      throw error;
    } finally {
      metrics.recordDuration(`fetch.${this.source}`, Date.now() - started);
    }
  }

  /**
   * Retry transient failures with exponential backoff (1s, 2s, ...), then
   * translate whatever is left into TransportFailureException.
   */
  private async withRetry<T>(fn: () => Promise<T>, url: string, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt < this.maxRetries && isTransientError(error)) {
          const delay = this.baseDelayMs * Math.pow(2, attempt);
          logger.warn('Transient fetch error, retrying', {
            source: this.source,
            url,
            attempt: attempt + 1,
            maxRetries: this.maxRetries,
            delay,
            errorMessage: error instanceof Error ? error.message : String(error),
            errorCode: axios.isAxiosError(error) ? error.code : undefined,
            status: axios.isAxiosError(error) ? error.response?.status : undefined,
          });
          await this.sleep(delay, signal);
          throwIfAborted(signal, url);
          continue;
        }
        throw this.toTransportFailure(error, url, signal);
      }
    }
  }

  private toTransportFailure(error: unknown, url: string, signal?: AbortSignal): Error {
    if (error instanceof TransportFailureException || error instanceof OperationAbortedException) {
      return error;
    }
    if (signal?.aborted || axios.isCancel(error)) {
      return new OperationAbortedException(url);
    }

    metrics.increment(`fetch.${this.source}.failed`);
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 429) return TransportFailureException.rateLimited(this.source, url);
      if (status === undefined && error.code && TIMEOUT_CODES.has(error.code)) {
        return TransportFailureException.timeout(this.source, url);
      }
      return TransportFailureException.fromError(this.source, url, error, status ?? 502);
    }
    return TransportFailureException.fromError(this.source, url, error);
  }
}
