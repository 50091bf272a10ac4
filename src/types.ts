import type { TransportError } from './errors.js';

// Overseerr API response types
export interface SearchResult {
  page: number;
  totalPages: number;
  totalResults: number;
  results: Array<{
    id: number;
    mediaType: string;
    title?: string;
    name?: string;
    overview?: string;
    releaseDate?: string;
    firstAirDate?: string;
  }>;
}

export type SearchResultItem = SearchResult['results'][number];

export interface MediaDetails {
  id: number;
  title?: string;
  name?: string;
  externalIds?: {
    imdbId?: string | null;
    // Overseerr passes TMDB's value through, which is not always a number
    tvdbId?: unknown;
  };
  seasons?: Array<{
    seasonNumber: number;
    episodeCount?: number;
    airDate?: string;
  }>;
}

// Domain types
export type MediaType = 'movie' | 'tv';

export interface MediaCandidate {
  id: number;
  mediaType: MediaType;
  displayTitle: string;
}

export interface MediaDetail {
  id: number;
  mediaType: MediaType;
  title: string;
  externalIds: {
    imdbId?: string;
    tvdbId?: unknown;
  };
  seasons: Array<{ seasonNumber: number }>;
}

export type SeasonsField = number[] | 'all';

export interface RequestPayload {
  mediaType: MediaType;
  mediaId: number;
  imdbId?: string;
  tvdbId?: number;
  seasons?: SeasonsField;
}

export type RequestScope = 'all-seasons' | 'latest-season' | 'unscoped';

export type Outcome =
  | { kind: 'empty-query' }
  | { kind: 'not-found'; query: string }
  | { kind: 'submitted'; title: string; scope: RequestScope }
  | { kind: 'submission-rejected'; status: number }
  | { kind: 'transport-error'; error: TransportError };

export type ErrorVerbosity = 'generic' | 'detailed';

// Pipeline input types
export interface MediaRequestIntent {
  title: string;
  requestAllSeasons: boolean;
  // Used for logging only
  sessionId?: string;
  userId?: string;
}

export interface PipelineResult {
  outcome: Outcome;
  text: string;
}
