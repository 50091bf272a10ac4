import { OverseerrClient, type OverseerrApi } from '../client.js';
import type { AppConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { buildRequestPayload } from './builder.js';
import { DetailFetcher } from './detail.js';
import { formatOutcome } from './formatter.js';
import {
  candidatePolicies,
  firstResult,
  latestSeason,
  type CandidateSelectionPolicy,
  type SeasonSelectionPolicy,
} from './policies.js';
import { MediaResolver } from './resolver.js';
import { RequestSubmitter } from './submitter.js';
import type { ErrorVerbosity, MediaRequestIntent, Outcome, PipelineResult } from '../types.js';

export interface PipelineOptions {
  errorVerbosity?: ErrorVerbosity;
  candidatePolicy?: CandidateSelectionPolicy;
  seasonPolicy?: SeasonSelectionPolicy;
}

/**
 * Search -> details -> build -> submit -> spoken text. Holds no per-request
 * state, so one instance can serve concurrent invocations.
 */
export class RequestPipeline {
  private resolver: MediaResolver;
  private fetcher: DetailFetcher;
  private submitter: RequestSubmitter;
  private seasonPolicy: SeasonSelectionPolicy;
  private errorVerbosity: ErrorVerbosity;

  constructor(api: OverseerrApi, options: PipelineOptions = {}) {
    this.resolver = new MediaResolver(api, options.candidatePolicy || firstResult);
    this.fetcher = new DetailFetcher(api);
    this.submitter = new RequestSubmitter(api);
    this.seasonPolicy = options.seasonPolicy || latestSeason;
    this.errorVerbosity = options.errorVerbosity || 'generic';
  }

  static fromConfig(config: AppConfig, options: Omit<PipelineOptions, 'errorVerbosity'> = {}): RequestPipeline {
    const api = OverseerrClient.fromOptions({
      baseUrl: config.overseerrUrl,
      apiKey: config.overseerrApiKey,
      timeoutMs: config.requestTimeoutMs,
    });
    return new RequestPipeline(api, {
      candidatePolicy: candidatePolicies[config.candidatePolicy],
      ...options,
      errorVerbosity: config.errorVerbosity,
    });
  }

  async run(intent: MediaRequestIntent): Promise<PipelineResult> {
    logger.info(
      `Media request '${intent.title}' (allSeasons=${intent.requestAllSeasons})` +
        ` session=${intent.sessionId ?? '-'} user=${intent.userId ?? '-'}`
    );
    const outcome = await this.resolveOutcome(intent);
    return { outcome, text: formatOutcome(outcome, this.errorVerbosity) };
  }

  private async resolveOutcome(intent: MediaRequestIntent): Promise<Outcome> {
    const title = intent.title.trim();
    if (!title) {
      return { kind: 'empty-query' };
    }

    try {
      const candidate = await this.resolver.resolve(title);
      if (!candidate) {
        return { kind: 'not-found', query: intent.title };
      }
      logger.debug(`Selected item: ${candidate.displayTitle} (Type: ${candidate.mediaType})`);

      const detail = await this.fetcher.fetchDetail(candidate);
      const payload = buildRequestPayload(detail, intent.requestAllSeasons, this.seasonPolicy);

      return await this.submitter.submit(payload, detail, intent.requestAllSeasons);
    } catch (error) {
      const transportError = TransportError.fromAxios(error);
      logger.error(`An error occurred: ${transportError.message}`);
      if (transportError.status !== undefined || transportError.bodyText()) {
        logger.error(
          `Server response (${transportError.status ?? 'no status'}): ${transportError.bodyText() ?? ''}`
        );
      }
      return { kind: 'transport-error', error: transportError };
    }
  }
}
