export interface SpotifyArtist {
  id?: string;
  name: string;
}

export interface SpotifyImage {
  url: string;
  height?: number | null;
  width?: number | null;
}

export interface SpotifySearchAlbum {
  name: string;
}

export interface SpotifySearchTrack {
  id: string;
  name: string;
  artists: SpotifyArtist[];
  album: SpotifySearchAlbum;
}

export interface SpotifyTrackAlbum {
  id: string;
  release_date: string;
  release_date_precision: string;
  images: SpotifyImage[];
}

export interface SpotifyTrack {
  id: string;
  name: string;
  artists: SpotifyArtist[];
  album: SpotifyTrackAlbum;
  duration_ms: number;
}

export interface SpotifyAlbum {
  id: string;
  label: string;
}
