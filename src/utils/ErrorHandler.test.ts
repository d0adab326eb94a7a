import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import {
  AuthenticationFailedError,
  ErrorHandler,
  MalformedResponseError,
  NetworkError,
  ServiceUnavailableError,
  SpotifyMetadataError,
  TrackNotFoundError,
  UnsupportedDatePrecisionError
} from './ErrorHandler.js';

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders(), method: 'get', url: 'https://api.test/v1/search' };

function httpError(status: number, data?: unknown): AxiosError {
  const response: AxiosResponse = { data, status, statusText: 'Status', headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
}

describe('ErrorHandler', () => {
  const handler = new ErrorHandler();

  it('passes already classified errors through', () => {
    const original = new MalformedResponseError('broken');
    expect(handler.classifyError(original, 'searchTrack')).toBe(original);
  });

  it('maps axios errors without a response to NetworkError', () => {
    const error = handler.classifyError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config), 'searchTrack');

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('Error de red durante searchTrack: timeout of 10000ms exceeded');
  });

  it('maps plain errors with network codes to NetworkError', () => {
    expect(handler.classifyError(new Error('getaddrinfo ENOTFOUND api.test'), 'searchTrack')).toBeInstanceOf(NetworkError);
  });

  it('maps 401 and 403 to AuthenticationFailedError', () => {
    expect(handler.classifyError(httpError(401), 'searchTrack')).toBeInstanceOf(AuthenticationFailedError);
    expect(handler.classifyError(httpError(403), 'getTrackInfo', 'track-1')).toBeInstanceOf(AuthenticationFailedError);
  });

  it('only treats 400 oauth errors as authentication failures on the token endpoint', () => {
    const body = { error: 'invalid_client', error_description: 'Invalid client' };

    expect(handler.classifyError(httpError(400, body), 'authenticate')).toBeInstanceOf(AuthenticationFailedError);

    const other = handler.classifyError(httpError(400, { error: { status: 400, message: 'No search query' } }), 'searchTrack');
    expect(other).not.toBeInstanceOf(AuthenticationFailedError);
    expect(other.code).toBe('HTTP_ERROR_400');
    expect(other.message).toBe('No search query');
  });

  it('maps 404 to TrackNotFoundError only for track lookups', () => {
    const notFound = handler.classifyError(httpError(404), 'getTrackInfo', 'track-9');
    expect(notFound).toBeInstanceOf(TrackNotFoundError);
    expect(notFound).toHaveProperty('trackId', 'track-9');

    expect(handler.classifyError(httpError(404), 'searchTrack').code).toBe('HTTP_ERROR_404');
  });

  it('maps 5xx to ServiceUnavailableError', () => {
    const error = handler.classifyError(httpError(502), 'searchTrack');
    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error.message).toBe('Servicio de Spotify no disponible (502): Status');
  });

  it('wraps non-error values', () => {
    const error = handler.classifyError('boom', 'authenticate');
    expect(error).toBeInstanceOf(SpotifyMetadataError);
    expect(error.code).toBe('UNKNOWN_ERROR');
  });

  it('execute classifies rejections', async () => {
    await expect(handler.execute(async () => { throw httpError(500); }, 'searchTrack')).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(handler.execute(async () => 'ok', 'searchTrack')).resolves.toBe('ok');
  });

  it('gives friendly messages per code', () => {
    expect(handler.getFriendlyMessage(new NetworkError('x'))).toBe(
      'Error de conexión de red. Por favor verificá tu conexión a internet e intentá de nuevo.'
    );
    expect(handler.getFriendlyMessage(new UnsupportedDatePrecisionError('decade'))).toBe(
      'No se pudo formatear la fecha de lanzamiento: Precisión de fecha no soportada: "decade"'
    );
    expect(handler.getFriendlyMessage(new SpotifyMetadataError('Something else', 'HTTP_ERROR_418'))).toBe('Something else');
  });
});
