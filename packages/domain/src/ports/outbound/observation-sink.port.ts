import type { TransformedObservation } from '../../entities/transformed-observation.js';

export interface ObservationSinkPort {
  send(integrationId: string, observations: readonly TransformedObservation[]): Promise<void>;
}
