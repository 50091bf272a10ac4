import type { OverseerrApi } from '../client.js';
import { TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { MediaDetail, Outcome, RequestPayload, RequestScope } from '../types.js';

export class RequestSubmitter {
  constructor(private api: OverseerrApi) {}

  async submit(payload: RequestPayload, detail: MediaDetail, requestAllSeasons: boolean): Promise<Outcome> {
    let status: number;
    try {
      ({ status } = await this.api.createRequest(payload));
    } catch (error) {
      const transportError = TransportError.fromAxios(error);
      logger.error(`Request for '${detail.title}' failed: ${transportError.message}`);
      if (transportError.bodyText()) {
        logger.error(`Server response: ${transportError.bodyText()}`);
      }
      return { kind: 'transport-error', error: transportError };
    }

    if (status !== 201) {
      logger.error(`Overseerr answered ${status} to request for '${detail.title}', expected 201`);
      return { kind: 'submission-rejected', status };
    }

    logger.debug('Request was successful');
    let scope: RequestScope = 'unscoped';
    if (detail.mediaType === 'tv') {
      scope = requestAllSeasons ? 'all-seasons' : 'latest-season';
    }
    return { kind: 'submitted', title: detail.title, scope };
  }
}
