import type { OverseerrApi } from '../client.js';
import type { MediaCandidate, MediaDetail, MediaDetails } from '../types.js';

export function toMediaDetail(candidate: MediaCandidate, details: MediaDetails): MediaDetail {
  const title = candidate.mediaType === 'tv' ? details.name : details.title;
  const imdbId = details.externalIds?.imdbId;

  return {
    id: details.id,
    mediaType: candidate.mediaType,
    title: title || candidate.displayTitle,
    externalIds: {
      imdbId: typeof imdbId === 'string' && imdbId.length > 0 ? imdbId : undefined,
      tvdbId: details.externalIds?.tvdbId,
    },
    seasons: Array.isArray(details.seasons)
      ? details.seasons
          .filter(s => Number.isInteger(s.seasonNumber))
          .map(s => ({ seasonNumber: s.seasonNumber }))
      : [],
  };
}

export class DetailFetcher {
  constructor(private api: OverseerrApi) {}

  async fetchDetail(candidate: MediaCandidate): Promise<MediaDetail> {
    const details = await this.api.getDetails(candidate.mediaType, candidate.id);
    return toMediaDetail(candidate, details);
  }
}
