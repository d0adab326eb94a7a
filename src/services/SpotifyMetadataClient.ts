import axios, { type AxiosInstance } from 'axios';
import type { Credentials } from '../models/Auth.js';
import type { TrackInfo, TrackSummary } from '../models/Track.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { AuthenticationFailedError, ErrorHandler } from '../utils/ErrorHandler.js';
import { formatDuration, formatReleaseDate } from '../utils/formatters.js';
import { parseAlbumResponse, parseSearchResponse, parseTokenResponse, parseTrackResponse } from '../utils/ResponseParser.js';

export interface ClientOptions {
  /** Instancia de axios a usar; por defecto se crea una con `timeout` */
  httpClient?: AxiosInstance;
  accountsUrl?: string;
  apiUrl?: string;
  timeout?: number;
}

/**
 * Cliente mínimo de la Web API de Spotify para buscar canciones y leer sus metadatos.
 * El token se obtiene una sola vez (client credentials) y no se renueva.
 */
export class SpotifyMetadataClient {
  private client: AxiosInstance;
  private errorHandler: ErrorHandler;
  private accountsUrl: string;
  private apiUrl: string;
  private authorizationHeader?: string;

  constructor(private credentials: Credentials, options: ClientOptions = {}) {
    this.errorHandler = new ErrorHandler();
    this.accountsUrl = options.accountsUrl ?? DEFAULT_CONFIG.ACCOUNTS_URL;
    this.apiUrl = options.apiUrl ?? DEFAULT_CONFIG.API_URL;
    this.client = options.httpClient ?? axios.create({
      timeout: options.timeout ?? DEFAULT_CONFIG.REQUEST_TIMEOUT,
    });
  }

  /**
   * Crea el cliente y se autentica antes de devolverlo
   */
  static async create(credentials: Credentials, options: ClientOptions = {}): Promise<SpotifyMetadataClient> {
    const client = new SpotifyMetadataClient(credentials, options);
    await client.authenticate();
    return client;
  }

  /**
   * Obtener un token con el flujo client credentials y guardarlo como header Bearer
   */
  async authenticate(): Promise<void> {
    const data = await this.errorHandler.execute(async () => {
      const payload = new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
      });

      const response = await this.client.post<unknown>(`${this.accountsUrl}/api/token`, payload.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      return response.data;
    }, 'authenticate');

    const { access_token } = parseTokenResponse(data);
    this.authorizationHeader = `Bearer ${access_token}`;
  }

  /**
   * Buscar canciones por texto libre.
   * `limit` se envía a Spotify, pero nunca se devuelven más de MAX_SEARCH_RESULTS filas.
   */
  async searchTrack(query: string, limit: number = DEFAULT_CONFIG.DEFAULT_SEARCH_LIMIT): Promise<TrackSummary[]> {
    const headers = this.authHeaders();

    const data = await this.errorHandler.execute(async () => {
      const response = await this.client.get<unknown>(`${this.apiUrl}/search`, {
        headers,
        params: { q: query, type: 'track', limit },
      });
      return response.data;
    }, 'searchTrack');

    return parseSearchResponse(data, DEFAULT_CONFIG.MAX_SEARCH_RESULTS).map((item, index) => ({
      position: index + 1,
      name: item.name,
      artist: item.artists[0].name,
      album: item.album.name,
      id: item.id,
    }));
  }

  /**
   * Obtener los metadatos de una canción elegida en la búsqueda (solo se usa su id).
   * Hace dos requests: la canción y luego su álbum, para obtener el sello.
   */
  async getTrackInfo(track: TrackSummary): Promise<TrackInfo> {
    const headers = this.authHeaders();

    const trackData = parseTrackResponse(await this.errorHandler.execute(async () => {
      const response = await this.client.get<unknown>(`${this.apiUrl}/tracks/${encodeURIComponent(track.id)}`, { headers });
      return response.data;
    }, 'getTrackInfo', track.id));

    const albumData = parseAlbumResponse(await this.errorHandler.execute(async () => {
      const response = await this.client.get<unknown>(`${this.apiUrl}/albums/${encodeURIComponent(trackData.album.id)}`, { headers });
      return response.data;
    }, 'getTrackInfo', track.id));

    const releaseDate = formatReleaseDate(trackData.album.release_date, trackData.album.release_date_precision);

    return {
      albumId: trackData.album.id,
      name: trackData.name,
      artist: trackData.artists[0].name,
      year: trackData.album.release_date,
      duration: formatDuration(trackData.duration_ms),
      image: trackData.album.images[0].url,
      label: `${releaseDate}\n${albumData.label}`,
      releaseDate,
      recordLabel: albumData.label,
      trackId: trackData.id,
      cover: DEFAULT_CONFIG.BANNER_PATH,
    };
  }

  private authHeaders(): { Authorization: string } {
    if (!this.authorizationHeader) {
      throw new AuthenticationFailedError('El cliente no está autenticado. Llamá a authenticate() primero');
    }
    return { Authorization: this.authorizationHeader };
  }
}
