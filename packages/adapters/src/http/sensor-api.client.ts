import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { TransientTransportError } from '@wildlife-telemetry/domain';
import type { ObservationSinkPort, TransformedObservation } from '@wildlife-telemetry/domain';
import type { HttpClientOptions } from './vendor-feed.client.js';

export interface SensorApiClientOptions extends HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
}

/** JSON body accepted by the sensor ingestion API. */
export interface SensorObservationPayload {
  source: string;
  source_name: string;
  type: string;
  recorded_at: string;
  location: { lat: number | null; lon: number | null };
  additional: Record<string, string | boolean>;
}

export function toSensorPayload(observation: TransformedObservation): SensorObservationPayload {
  return {
    source: observation.source,
    source_name: observation.sourceName,
    type: observation.type,
    recorded_at: observation.recordedAt.toISOString(),
    location: { lat: observation.location.lat, lon: observation.location.lon },
    additional: { ...observation.additional },
  };
}

export class SensorApiClient implements ObservationSinkPort {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: SensorApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
  }

  async send(integrationId: string, observations: readonly TransformedObservation[]): Promise<void> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'x-integration-id': integrationId,
    };
    if (this.apiKey) headers['authorization'] = `Bearer ${this.apiKey}`;

    const url = `${this.baseUrl}/observations`;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(observations.map(toSensorPayload)),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new TransientTransportError(
          `Sensor API answered ${response.status}: ${text.slice(0, 200)}`,
          response.status,
        );
      }
    } catch (err) {
      if (err instanceof TransientTransportError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransientTransportError(`Sensor API request failed: ${reason}`, undefined, { cause: err });
    }
  }
}
