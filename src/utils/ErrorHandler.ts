import { isAxiosError, type AxiosError } from 'axios';

export type ClientOperation = 'authenticate' | 'searchTrack' | 'getTrackInfo';

export class SpotifyMetadataError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'SpotifyMetadataError';
  }
}

export class AuthenticationFailedError extends SpotifyMetadataError {
  constructor(message: string, originalError?: Error) {
    super(message, 'AUTHENTICATION_FAILED', originalError);
    this.name = 'AuthenticationFailedError';
  }
}

export class TrackNotFoundError extends SpotifyMetadataError {
  constructor(
    message: string,
    public readonly trackId: string,
    originalError?: Error
  ) {
    super(message, 'TRACK_NOT_FOUND', originalError);
    this.name = 'TrackNotFoundError';
  }
}

export class MalformedResponseError extends SpotifyMetadataError {
  constructor(message: string, originalError?: Error) {
    super(message, 'MALFORMED_RESPONSE', originalError);
    this.name = 'MalformedResponseError';
  }
}

export class UnsupportedDatePrecisionError extends SpotifyMetadataError {
  constructor(public readonly precision: string) {
    super(`Precisión de fecha no soportada: "${precision}"`, 'UNSUPPORTED_DATE_PRECISION');
    this.name = 'UnsupportedDatePrecisionError';
  }
}

export class NetworkError extends SpotifyMetadataError {
  constructor(message: string, originalError?: Error) {
    super(message, 'NETWORK_ERROR', originalError);
    this.name = 'NetworkError';
  }
}

export class ServiceUnavailableError extends SpotifyMetadataError {
  constructor(
    message: string,
    public readonly status: number,
    originalError?: Error
  ) {
    super(message, 'SERVICE_UNAVAILABLE', originalError);
    this.name = 'ServiceUnavailableError';
  }
}

const OAUTH_CLIENT_ERRORS = ['invalid_client', 'invalid_request', 'invalid_grant', 'unsupported_grant_type'];

const NETWORK_ERROR_CODES = [
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
];

/**
 * Traduce los fallos de axios (y cualquier otro error) a la jerarquía de SpotifyMetadataError.
 * No reintenta nada: cada error se clasifica una sola vez y se propaga.
 */
export class ErrorHandler {
  classifyError(error: unknown, operation: ClientOperation, trackId?: string): SpotifyMetadataError {
    if (error instanceof SpotifyMetadataError) {
      return error;
    }

    if (isAxiosError(error)) {
      return this.classifyAxiosError(error, operation, trackId);
    }

    if (error instanceof Error) {
      if (this.isNetworkError(error)) {
        return new NetworkError(`Error de red: ${error.message}`, error);
      }

      return new SpotifyMetadataError(error.message, 'UNKNOWN_ERROR', error);
    }

    return new SpotifyMetadataError('Ocurrió un error desconocido', 'UNKNOWN_ERROR');
  }

  private classifyAxiosError(error: AxiosError, operation: ClientOperation, trackId?: string): SpotifyMetadataError {
    // Sin respuesta - error de red o timeout
    if (!error.response) {
      return new NetworkError(`Error de red durante ${operation}: ${error.message}`, error);
    }

    const status = error.response.status;
    const statusText = error.response.statusText || '';
    const providerMessage = this.readProviderMessage(error.response.data);

    if (status === 401 || status === 403) {
      return new AuthenticationFailedError(
        providerMessage || 'Autenticación fallida - credenciales inválidas o token expirado',
        error
      );
    }

    if (status === 400 && operation === 'authenticate') {
      const oauthError = this.readOAuthError(error.response.data);
      if (oauthError && OAUTH_CLIENT_ERRORS.includes(oauthError)) {
        return new AuthenticationFailedError(providerMessage || 'Credenciales de cliente inválidas', error);
      }
    }

    if (status === 404 && trackId !== undefined) {
      return new TrackNotFoundError(`No se encontró la canción ${trackId} en Spotify`, trackId, error);
    }

    if (status >= 500) {
      return new ServiceUnavailableError(`Servicio de Spotify no disponible (${status}): ${statusText}`, status, error);
    }

    return new SpotifyMetadataError(
      providerMessage || `Error HTTP (${status}) durante ${operation}: ${statusText}`,
      `HTTP_ERROR_${status}`,
      error
    );
  }

  /**
   * Ejecutar una operación y clasificar cualquier fallo
   */
  async execute<T>(operation: () => Promise<T>, operationName: ClientOperation, trackId?: string): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.classifyError(error, operationName, trackId);
    }
  }

  /**
   * El endpoint de tokens responde { error, error_description }; la Web API responde { error: { status, message } }
   */
  private readProviderMessage(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null) {
      return undefined;
    }

    if ('error_description' in data && typeof data.error_description === 'string') {
      return data.error_description;
    }

    if ('error' in data) {
      const body = data.error;
      if (typeof body === 'string') {
        return body;
      }
      if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
      }
    }

    return undefined;
  }

  private readOAuthError(data: unknown): string | undefined {
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
    return undefined;
  }

  private isNetworkError(error: Error): boolean {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

    return NETWORK_ERROR_CODES.some(networkCode =>
      error.message.includes(networkCode) || code === networkCode
    );
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  getFriendlyMessage(error: SpotifyMetadataError): string {
    switch (error.code) {
      case 'AUTHENTICATION_FAILED':
        return 'La autenticación de Spotify falló. Por favor verificá tu client ID y client secret en credentials.txt';

      case 'TRACK_NOT_FOUND':
        return 'Spotify no encontró la canción seleccionada. Probá con otra búsqueda.';

      case 'MALFORMED_RESPONSE':
        return `Spotify devolvió una respuesta inesperada: ${error.message}`;

      case 'UNSUPPORTED_DATE_PRECISION':
        return `No se pudo formatear la fecha de lanzamiento: ${error.message}`;

      case 'NETWORK_ERROR':
        return 'Error de conexión de red. Por favor verificá tu conexión a internet e intentá de nuevo.';

      case 'SERVICE_UNAVAILABLE':
        return 'El servicio de Spotify no está disponible temporalmente. Por favor intentá más tarde.';

      default:
        return error.message;
    }
  }
}
