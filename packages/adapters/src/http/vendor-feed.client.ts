import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { TransientTransportError } from '@wildlife-telemetry/domain';
import type { VendorCredentials, VendorFeedPort } from '@wildlife-telemetry/domain';

export const DEFAULT_VENDOR_TIMEOUT_MS = 120_000;

export interface HttpClientOptions {
  /** Upper bound for a single request, independent of any retry policy. */
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export function basicAuthHeader({ username, password }: VendorCredentials): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

export class HttpVendorFeedClient implements VendorFeedPort {
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VENDOR_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async fetchXml(endpoint: string, credentials: VendorCredentials): Promise<string> {
    try {
      const response = await fetch(endpoint, {
        method: 'GET',
        headers: {
          authorization: basicAuthHeader(credentials),
          accept: 'application/xml, text/xml',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        await response.text();
        throw new TransientTransportError(
          `Vendor endpoint ${endpoint} answered ${response.status}`,
          response.status,
        );
      }
      return await response.text();
    } catch (err) {
      if (err instanceof TransientTransportError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransientTransportError(`Vendor request to ${endpoint} failed: ${reason}`, undefined, {
        cause: err,
      });
    }
  }
}
