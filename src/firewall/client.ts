import * as http from 'http';
import * as https from 'https';
import { URL } from 'url';

import { DebugLogger, silentDebug } from '../utils/logger';

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Result of a single GET against the firewall. Every call site switches on
 * `kind` once instead of catching transport exceptions.
 */
export type HttpOutcome =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'connection-error'; message: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'failure'; message: string };

type GetFn = (
  url: URL,
  options: http.RequestOptions,
  callback: (res: http.IncomingMessage) => void,
) => http.ClientRequest;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
]);

function classifyError(err: NodeJS.ErrnoException): HttpOutcome {
  if (err.code && CONNECTION_ERROR_CODES.has(err.code)) {
    return { kind: 'connection-error', message: err.message };
  }
  return { kind: 'failure', message: err.message };
}

export interface FirewallClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  debug?: DebugLogger;
}

/**
 * One keep-alive connection pool per CLI invocation. Shared by the validator,
 * the blocked-info resolver and the connectivity probe; callers must `close()`
 * it once they are done.
 */
export class FirewallClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly agent: http.Agent;
  private readonly getFn: GetFn;
  private readonly debug: DebugLogger;
  private closed = false;

  constructor(options: FirewallClientOptions) {
    this.baseUrl = options.baseUrl.trim().replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? silentDebug;

    let parsed: URL;
    try {
      parsed = new URL(this.baseUrl);
    } catch {
      throw new Error(`Invalid firewall URL: ${options.baseUrl}`);
    }

    if (parsed.protocol === 'https:') {
      this.agent = new https.Agent({ keepAlive: true });
      this.getFn = (url, opts, cb) => https.get(url, opts, cb);
    } else if (parsed.protocol === 'http:') {
      this.agent = new http.Agent({ keepAlive: true });
      this.getFn = (url, opts, cb) => http.get(url, opts, cb);
    } else {
      throw new Error(`Unsupported firewall URL protocol: ${parsed.protocol}`);
    }
  }

  /** `{base}/blocked/{package}`, shown to users as the place to look up a block. */
  auditUrl(packageName: string): string {
    return `${this.baseUrl}/blocked/${packageName}`;
  }

  get(path: string, timeoutMs: number = this.timeoutMs): Promise<HttpOutcome> {
    const target = `${this.baseUrl}${path}`;
    if (this.closed) {
      return Promise.resolve({ kind: 'failure', message: 'Firewall client is closed' });
    }

    return new Promise((resolve) => {
      let settled = false;
      const settle = (outcome: HttpOutcome) => {
        if (settled) return;
        settled = true;
        this.debug(`GET ${target} -> ${describeOutcome(outcome)}`);
        resolve(outcome);
      };

      let req: http.ClientRequest;
      try {
        req = this.getFn(
          new URL(target),
          {
            agent: this.agent,
            headers: { Accept: 'application/json, text/html', 'User-Agent': 'pip-warden' },
          },
          (res) => {
            let data = '';
            res.setEncoding('utf8');
            res.on('data', (chunk: string) => (data += chunk));
            res.on('end', () => settle({ kind: 'response', status: res.statusCode ?? 0, body: data }));
            res.on('error', (err: NodeJS.ErrnoException) => settle(classifyError(err)));
          },
        );
      } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        settle({ kind: 'failure', message: msg });
        return;
      }

      req.setTimeout(timeoutMs, () => {
        if (settled) return;
        settle({ kind: 'timeout', timeoutMs });
        req.destroy();
      });
      req.on('error', (err: NodeJS.ErrnoException) => settle(classifyError(err)));
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.agent.destroy();
  }
}

export function describeOutcome(outcome: HttpOutcome): string {
  switch (outcome.kind) {
    case 'response':
      return `HTTP ${outcome.status}`;
    case 'connection-error':
      return `connection error (${outcome.message})`;
    case 'timeout':
      return `timed out after ${outcome.timeoutMs}ms`;
    case 'failure':
      return `failed (${outcome.message})`;
  }
}
