export type ReleaseDatePrecision = 'day' | 'month' | 'year';

/**
 * Fila de resultado de búsqueda. La posición empieza en 1.
 */
export interface TrackSummary {
  position: number;
  name: string;
  artist: string;
  album: string;
  id: string;
}

export interface TrackInfo {
  albumId: string;
  name: string;
  artist: string;
  year: string; // release_date tal cual lo devuelve Spotify
  duration: string; // MM:SS
  image: string;
  label: string; // fecha formateada + salto de línea + sello
  releaseDate: string;
  recordLabel: string;
  trackId: string;
  cover: string;
}
