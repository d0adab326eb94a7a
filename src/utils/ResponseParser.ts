import type { TokenResponse } from '../models/Auth.js';
import type { SpotifyAlbum, SpotifyArtist, SpotifyImage, SpotifySearchTrack, SpotifyTrack } from '../models/SpotifyTypes.js';
import { AuthenticationFailedError, MalformedResponseError } from './ErrorHandler.js';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(source: JsonObject, field: string, path: string): JsonObject {
  const value = source[field];
  if (!isJsonObject(value)) {
    throw new MalformedResponseError(`Falta el objeto "${path}.${field}" en la respuesta`);
  }
  return value;
}

function readString(source: JsonObject, field: string, path: string): string {
  const value = source[field];
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`Falta el campo "${path}.${field}" en la respuesta`);
  }
  return value;
}

function readNumber(source: JsonObject, field: string, path: string): number {
  const value = source[field];
  if (typeof value !== 'number') {
    throw new MalformedResponseError(`Falta el campo numérico "${path}.${field}" en la respuesta`);
  }
  return value;
}

/**
 * Lee un array y exige al menos un elemento, ya que siempre se usa el primero
 */
function readNonEmptyArray(source: JsonObject, field: string, path: string): JsonObject[] {
  const value = source[field];
  if (!Array.isArray(value) || value.length === 0) {
    throw new MalformedResponseError(`"${path}.${field}" debe ser una lista con al menos un elemento`);
  }
  return value.map((item: unknown, index) => {
    if (!isJsonObject(item)) {
      throw new MalformedResponseError(`"${path}.${field}[${index}]" no es un objeto`);
    }
    return item;
  });
}

function parseArtists(source: JsonObject, path: string): SpotifyArtist[] {
  return readNonEmptyArray(source, 'artists', path).map((artist, index) => ({
    name: readString(artist, 'name', `${path}.artists[${index}]`)
  }));
}

export function parseTokenResponse(data: unknown): TokenResponse {
  if (!isJsonObject(data)) {
    throw new AuthenticationFailedError('La respuesta de Spotify no contiene un access_token');
  }

  const token = data.access_token;
  if (typeof token !== 'string' || token === '') {
    throw new AuthenticationFailedError('La respuesta de Spotify no contiene un access_token');
  }

  return {
    access_token: token,
    token_type: typeof data.token_type === 'string' ? data.token_type : undefined,
    expires_in: typeof data.expires_in === 'number' ? data.expires_in : undefined
  };
}

/**
 * Extrae los primeros `maxResults` items de una respuesta de /search.
 * Sin "tracks" o sin "items" se considera búsqueda sin resultados.
 */
export function parseSearchResponse(data: unknown, maxResults: number): SpotifySearchTrack[] {
  const tracks = isJsonObject(data) ? data.tracks : undefined;
  if (!isJsonObject(tracks)) {
    return [];
  }

  const items = tracks.items;
  if (!Array.isArray(items)) {
    return [];
  }

  return items.slice(0, maxResults).map((item: unknown, index) => {
    const path = `tracks.items[${index}]`;
    if (!isJsonObject(item)) {
      throw new MalformedResponseError(`"${path}" no es un objeto`);
    }

    return {
      id: readString(item, 'id', path),
      name: readString(item, 'name', path),
      artists: parseArtists(item, path),
      album: { name: readString(readObject(item, 'album', path), 'name', `${path}.album`) }
    };
  });
}

export function parseTrackResponse(data: unknown): SpotifyTrack {
  if (!isJsonObject(data)) {
    throw new MalformedResponseError('La respuesta de /tracks no es un objeto');
  }

  const album = readObject(data, 'album', 'track');
  const images: SpotifyImage[] = readNonEmptyArray(album, 'images', 'track.album').map((image, index) => ({
    url: readString(image, 'url', `track.album.images[${index}]`)
  }));

  return {
    id: readString(data, 'id', 'track'),
    name: readString(data, 'name', 'track'),
    artists: parseArtists(data, 'track'),
    duration_ms: readNumber(data, 'duration_ms', 'track'),
    album: {
      id: readString(album, 'id', 'track.album'),
      release_date: readString(album, 'release_date', 'track.album'),
      release_date_precision: readString(album, 'release_date_precision', 'track.album'),
      images
    }
  };
}

export function parseAlbumResponse(data: unknown): SpotifyAlbum {
  if (!isJsonObject(data)) {
    throw new MalformedResponseError('La respuesta de /albums no es un objeto');
  }

  return {
    id: readString(data, 'id', 'album'),
    label: readString(data, 'label', 'album')
  };
}
