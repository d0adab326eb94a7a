import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { formatSummaryChoice, renderSearchResults, renderTrackInfo } from './TrackRenderer.js';

describe('TrackRenderer', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const summary = { position: 2, name: 'Night Drive', artist: 'The Placeholders', album: 'Test Album', id: 'track-1' };

  it('formats a list choice', () => {
    expect(formatSummaryChoice(summary)).toBe('2. Night Drive - The Placeholders (Test Album)');
  });

  it('renders one line per search result', () => {
    expect(renderSearchResults([summary])).toEqual(['2. Night Drive - The Placeholders (Test Album) track-1']);
  });

  it('renders a notice for an empty search', () => {
    expect(renderSearchResults([])).toEqual(['No se encontraron canciones para esa búsqueda.']);
  });

  it('renders the track metadata', () => {
    const lines = renderTrackInfo({
      albumId: 'album-1',
      name: 'Night Drive',
      artist: 'The Placeholders',
      year: '2021-05-10',
      duration: '03:05',
      image: 'https://images.test/cover-640.jpg',
      label: 'May 10, 2021\nTest Records',
      releaseDate: 'May 10, 2021',
      recordLabel: 'Test Records',
      trackId: 'track-1',
      cover: './assets/spotify_banner.jpg'
    });

    expect(lines).toEqual([
      '🎵 Night Drive',
      'Artista:   The Placeholders',
      'Duración:  03:05',
      'Lanzado:   May 10, 2021',
      'Sello:     Test Records',
      'Portada:   https://images.test/cover-640.jpg',
      'Track ID:  track-1',
      'Álbum ID:  album-1'
    ]);
  });
});
