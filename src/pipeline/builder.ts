import { latestSeason, type SeasonSelectionPolicy } from './policies.js';
import type { MediaDetail, RequestPayload, SeasonsField } from '../types.js';

/**
 * Accepts JSON numbers only, integer or float, truncated to an integer.
 * Strings such as "12345" are not coerced.
 */
function parseTvdbId(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  const id = Math.trunc(value);
  return id !== 0 ? id : undefined;
}

function selectSeasons(
  detail: MediaDetail,
  requestAllSeasons: boolean,
  policy: SeasonSelectionPolicy
): SeasonsField {
  // No season metadata at all: let Overseerr work out the seasons
  if (detail.seasons.length === 0) {
    return 'all';
  }

  // Season 0 holds specials
  const regular = [...new Set(detail.seasons.map(s => s.seasonNumber))].filter(n => n !== 0);
  if (regular.length === 0) {
    return 'all';
  }

  return requestAllSeasons ? regular : policy(regular);
}

export function buildRequestPayload(
  detail: MediaDetail,
  requestAllSeasons: boolean,
  seasonPolicy: SeasonSelectionPolicy = latestSeason
): RequestPayload {
  const payload: RequestPayload = {
    mediaType: detail.mediaType,
    mediaId: detail.id,
  };

  if (detail.externalIds.imdbId) {
    payload.imdbId = detail.externalIds.imdbId;
  }

  const tvdbId = parseTvdbId(detail.externalIds.tvdbId);
  if (tvdbId !== undefined) {
    payload.tvdbId = tvdbId;
  }

  if (detail.mediaType === 'tv') {
    payload.seasons = selectSeasons(detail, requestAllSeasons, seasonPolicy);
  }

  return payload;
}
