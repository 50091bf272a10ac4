import { describe, expect, it } from 'vitest';
import { RequestPipeline } from './pipeline.js';
import { preferHintedType } from './policies.js';
import { TransportError } from '../errors.js';
import { createFakeApi, theWireLibrary } from '../testing/fakeApi.js';

describe('RequestPipeline', () => {
  it('requests the latest season of a show', async () => {
    const api = createFakeApi(theWireLibrary);
    const pipeline = new RequestPipeline(api);

    const result = await pipeline.run({ title: 'The Wire', requestAllSeasons: false });

    expect(result.text).toBe("I have successfully added the latest season of 'The Wire' to your requests.");
    expect(api.getDetails).toHaveBeenCalledWith('tv', 99);
    expect(api.createRequest).toHaveBeenCalledWith({
      mediaType: 'tv',
      mediaId: 99,
      imdbId: 'tt0306414',
      tvdbId: 79126,
      seasons: [5],
    });
  });

  it('requests all seasons of a show', async () => {
    const api = createFakeApi(theWireLibrary);
    const result = await new RequestPipeline(api).run({ title: 'The Wire', requestAllSeasons: true });

    expect(result.text).toBe("I have successfully added all seasons of 'The Wire' to your requests.");
    expect(api.createRequest.mock.calls[0][0].seasons).toEqual([1, 2, 3, 4, 5]);
  });

  it('requests a movie without seasons', async () => {
    const api = createFakeApi({
      search: { Heat: [{ id: 949, mediaType: 'movie', title: 'Heat' }] },
      details: { 'movie/949': { id: 949, title: 'Heat', externalIds: { imdbId: 'tt0113277' } } },
    });

    const result = await new RequestPipeline(api).run({ title: 'Heat', requestAllSeasons: true });

    expect(result.text).toBe("I have successfully added 'Heat' to your requests.");
    expect(api.createRequest).toHaveBeenCalledWith({ mediaType: 'movie', mediaId: 949, imdbId: 'tt0113277' });
  });

  it('reports titles with no search results', async () => {
    const api = createFakeApi();
    const result = await new RequestPipeline(api).run({ title: 'Unknown Movie XYZ', requestAllSeasons: false });

    expect(result.outcome).toEqual({ kind: 'not-found', query: 'Unknown Movie XYZ' });
    expect(result.text).toBe("I'm sorry, but I couldn't find any media matching 'Unknown Movie XYZ'.");
    expect(api.getDetails).not.toHaveBeenCalled();
  });

  it('skips people in search results', async () => {
    const api = createFakeApi({
      search: { 'Al Pacino': [{ id: 1158, mediaType: 'person', name: 'Al Pacino' }] },
    });
    const result = await new RequestPipeline(api).run({ title: 'Al Pacino', requestAllSeasons: false });

    expect(result.outcome.kind).toBe('not-found');
  });

  it('asks for a title without calling Overseerr', async () => {
    const api = createFakeApi(theWireLibrary);
    const result = await new RequestPipeline(api).run({ title: '   ', requestAllSeasons: false });

    expect(result.text).toBe('Please provide the title of the movie or TV show.');
    expect(api.search).not.toHaveBeenCalled();
  });

  it('gives the generic rejection message for a non-201 success', async () => {
    const api = createFakeApi({ ...theWireLibrary, requestStatus: 200 });
    const pipeline = new RequestPipeline(api, { errorVerbosity: 'detailed' });

    const result = await pipeline.run({ title: 'The Wire', requestAllSeasons: false });

    expect(result.outcome).toEqual({ kind: 'submission-rejected', status: 200 });
    expect(result.text).toBe("I couldn't add your request. Please check the details and try again.");
  });

  it('turns a failed search into a spoken error', async () => {
    const api = createFakeApi(theWireLibrary);
    api.search.mockRejectedValueOnce(
      new TransportError('Request failed with status code 503', { status: 503, body: 'Service Unavailable' })
    );

    const result = await new RequestPipeline(api).run({ title: 'The Wire', requestAllSeasons: false });

    expect(result.outcome.kind).toBe('transport-error');
    expect(result.text).toBe('An error occurred while processing your request. Please try again later.');
  });

  it('includes upstream detail for a failed submission when detailed', async () => {
    const api = createFakeApi(theWireLibrary);
    api.createRequest.mockRejectedValueOnce(
      new TransportError('Request failed with status code 409', {
        status: 409,
        body: { message: 'Request for this media already exists.' },
      })
    );
    const pipeline = new RequestPipeline(api, { errorVerbosity: 'detailed' });

    const result = await pipeline.run({ title: 'The Wire', requestAllSeasons: false });

    expect(result.text).toBe(
      'An error occurred while processing your request: Request for this media already exists. Please try again later.'
    );
  });

  it('reports a failed detail lookup as a transport error', async () => {
    const api = createFakeApi({ search: theWireLibrary.search });
    const result = await new RequestPipeline(api).run({ title: 'The Wire', requestAllSeasons: false });

    expect(result.outcome.kind).toBe('transport-error');
    expect(api.createRequest).not.toHaveBeenCalled();
  });

  it('uses the candidate policy it was given', async () => {
    const api = createFakeApi({
      search: {
        'Fargo Season 2': [
          { id: 275, mediaType: 'movie', title: 'Fargo' },
          { id: 60622, mediaType: 'tv', name: 'Fargo' },
        ],
      },
      details: { 'tv/60622': { id: 60622, name: 'Fargo', seasons: [{ seasonNumber: 1 }, { seasonNumber: 2 }] } },
    });
    const pipeline = new RequestPipeline(api, { candidatePolicy: preferHintedType });

    const result = await pipeline.run({ title: 'Fargo Season 2', requestAllSeasons: false });

    expect(api.getDetails).toHaveBeenCalledWith('tv', 60622);
    expect(result.text).toBe("I have successfully added the latest season of 'Fargo' to your requests.");
  });

  it('keeps concurrent invocations isolated', async () => {
    const api = createFakeApi({
      search: {
        'The Wire': theWireLibrary.search?.['The Wire'] ?? [],
        Heat: [{ id: 949, mediaType: 'movie', title: 'Heat' }],
      },
      details: {
        ...theWireLibrary.details,
        'movie/949': { id: 949, title: 'Heat' },
      },
    });
    // Make the first search finish last
    const search = api.search.getMockImplementation();
    api.search.mockImplementation(async (query: string) => {
      await new Promise(resolve => setTimeout(resolve, query === 'The Wire' ? 20 : 0));
      if (!search) throw new Error('search mock missing');
      return search(query);
    });
    const pipeline = new RequestPipeline(api);

    const [wire, heat] = await Promise.all([
      pipeline.run({ title: 'The Wire', requestAllSeasons: true }),
      pipeline.run({ title: 'Heat', requestAllSeasons: false }),
    ]);

    expect(wire.text).toBe("I have successfully added all seasons of 'The Wire' to your requests.");
    expect(heat.text).toBe("I have successfully added 'Heat' to your requests.");
    expect(api.createRequest.mock.calls.map(([payload]) => payload)).toEqual([
      { mediaType: 'movie', mediaId: 949 },
      { mediaType: 'tv', mediaId: 99, imdbId: 'tt0306414', tvdbId: 79126, seasons: [1, 2, 3, 4, 5] },
    ]);
  });
});
