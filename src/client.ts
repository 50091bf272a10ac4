import axios, { type AxiosInstance } from 'axios';
import { TransportError } from './errors.js';
import { encodeSearchQuery } from './utils/normalize.js';
import { logger } from './utils/logger.js';
import type { MediaDetails, MediaType, RequestPayload, SearchResult } from './types.js';

/**
 * The three Overseerr endpoints the request pipeline uses. Every method
 * rejects with a TransportError on connection failures and non-2xx responses.
 */
export interface OverseerrApi {
  search(query: string): Promise<SearchResult>;
  getDetails(mediaType: MediaType, id: number): Promise<MediaDetails>;
  createRequest(payload: RequestPayload): Promise<{ status: number; data: unknown }>;
}

export interface OverseerrClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  language?: string;
}

export function createAxiosInstance(options: OverseerrClientOptions): AxiosInstance {
  return axios.create({
    baseURL: `${options.baseUrl.replace(/\/+$/, '')}/api/v1`,
    timeout: options.timeoutMs,
    headers: {
      'X-Api-Key': options.apiKey,
      'Content-Type': 'application/json',
    },
  });
}

export class OverseerrClient implements OverseerrApi {
  private language: string;

  constructor(private axiosInstance: AxiosInstance, options: { language?: string } = {}) {
    this.language = options.language || 'en';
  }

  static fromOptions(options: OverseerrClientOptions): OverseerrClient {
    return new OverseerrClient(createAxiosInstance(options), { language: options.language });
  }

  async search(query: string): Promise<SearchResult> {
    // Build URL manually so the query is encoded exactly once
    const url = `/search?query=${encodeSearchQuery(query)}&page=1&language=${this.language}`;
    logger.debug(`Searching for '${query}' at ${url}`);
    try {
      const response = await this.axiosInstance.get<SearchResult>(url);
      return response.data;
    } catch (error) {
      throw TransportError.fromAxios(error);
    }
  }

  async getDetails(mediaType: MediaType, id: number): Promise<MediaDetails> {
    const url = `/${mediaType}/${id}`;
    logger.debug(`Fetching details from ${url}`);
    try {
      const response = await this.axiosInstance.get<MediaDetails>(url);
      return response.data;
    } catch (error) {
      throw TransportError.fromAxios(error);
    }
  }

  async createRequest(payload: RequestPayload): Promise<{ status: number; data: unknown }> {
    logger.debug(`Sending request to /request`);
    logger.debug(`Request data: ${JSON.stringify(payload, null, 2)}`);
    try {
      const response = await this.axiosInstance.post<unknown>('/request', payload);
      return { status: response.status, data: response.data };
    } catch (error) {
      throw TransportError.fromAxios(error);
    }
  }
}
