import { describe, it, expect } from 'vitest';
import AppleMusicProvider from '../AppleMusicProvider';
import Settings from '../../settings';
import { ServiceType } from '../../enums/ServiceType';
import { createFakeHttp } from '../../__tests__/helpers/fakeHttp';

const catalogTrack = {
  trackId: 1001,
  trackName: 'Bohemian Rhapsody',
  artistName: 'Queen',
  collectionName: 'A Night at the Opera',
  primaryGenreName: 'Rock',
  releaseDate: '1975-10-31T12:00:00Z',
  trackViewUrl: 'https://music.apple.com/us/album/bohemian-rhapsody/1000?i=1001',
};

describe('AppleMusicProvider', () => {
  it('searches the catalog and normalizes the top hit', async () => {
    const { http, requests } = createFakeHttp(() => ({
      data: { resultCount: 1, results: [catalogTrack] },
    }));
    const provider = new AppleMusicProvider(
      Settings.with({ requestDelayMs: 0, itunesCountry: 'gb' }),
      http
    );

    const result = await provider.searchTracks('Bohemian Rhapsody');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      total: 1,
      tracks: [
        {
          id: '1001',
          name: 'Bohemian Rhapsody',
          artist: 'Queen',
          album: 'A Night at the Opera',
          genre: 'Rock',
          composer: null,
          releaseDate: '1975-10-31T12:00:00Z',
          serviceType: ServiceType.APPLE_MUSIC,
          serviceLink:
            'https://music.apple.com/us/album/bohemian-rhapsody/1000?i=1001',
        },
      ],
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://itunes.apple.com/search');
    expect(requests[0].params).toEqual({
      term: 'Bohemian Rhapsody',
      media: 'music',
      entity: 'song',
      limit: 1,
      country: 'gb',
    });
  });

  it('keeps a listed composer and drops a blank one', async () => {
    const { http } = createFakeHttp(() => ({
      data: {
        resultCount: 2,
        results: [
          { ...catalogTrack, composer: ' Ludwig van Beethoven ' },
          { ...catalogTrack, trackId: 1002, composer: '  ' },
        ],
      },
    }));
    const provider = new AppleMusicProvider(Settings.with({ requestDelayMs: 0 }), http);

    const result = await provider.searchTracks('Beethoven Symphony 9', 2);

    expect(result.data?.tracks.map((track) => track.composer)).toEqual([
      'Ludwig van Beethoven',
      null,
    ]);
  });

  it('reports an empty catalog as a successful empty search', async () => {
    const { http } = createFakeHttp(() => ({ data: { resultCount: 0, results: [] } }));
    const provider = new AppleMusicProvider(Settings.with({ requestDelayMs: 0 }), http);

    await expect(provider.searchTracks('zzzz')).resolves.toEqual({
      success: true,
      data: { tracks: [], total: 0 },
    });
  });

  it('turns HTTP failures into an error result', async () => {
    const { http } = createFakeHttp(() => ({ status: 500, data: {} }));
    const provider = new AppleMusicProvider(Settings.with({ requestDelayMs: 0 }), http);

    await expect(provider.searchTracks('Bohemian Rhapsody')).resolves.toEqual({
      success: false,
      error: 'Apple Music search error: HTTP 500: Request failed with status code 500',
    });
  });

  it('rejects an empty query without calling the catalog', async () => {
    const { http, requests } = createFakeHttp(() => undefined);
    const provider = new AppleMusicProvider(Settings.with({ requestDelayMs: 0 }), http);

    await expect(provider.searchTracks('  ')).resolves.toEqual({
      success: false,
      error: 'Search term is required',
    });
    expect(requests).toHaveLength(0);
  });
});
