/**
 * Configuración por defecto para el cliente y el CLI
 */
export const DEFAULT_CONFIG = {
  // Archivo de credenciales por defecto
  CREDENTIALS_FILE: 'credentials.txt',

  // Endpoints de Spotify
  ACCOUNTS_URL: 'https://accounts.spotify.com',
  API_URL: 'https://api.spotify.com/v1',

  // Timeouts
  REQUEST_TIMEOUT: 10000,

  // Búsqueda: el límite se envía a Spotify, pero el resultado se recorta a MAX_SEARCH_RESULTS
  DEFAULT_SEARCH_LIMIT: 5,
  MAX_SEARCH_RESULTS: 10,

  // Banner local que acompaña los metadatos de cada canción
  BANNER_PATH: './assets/spotify_banner.jpg',

  ERROR_LOG_FILE: 'request-errors.json',
  MAX_ERROR_LOG_ENTRIES: 100
} as const;

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  WELCOME: '🎵 Spotify Track Info',
  DESCRIPTION: 'Buscá canciones en Spotify y obtené sus metadatos al instante',

  CREDENTIALS_MISSING: `
❌ No se encontraron credenciales de Spotify.

Podés definirlas de dos maneras:

1. Variables de entorno (o un archivo .env en este directorio):

SPOTIFY_CLIENT_ID = tu_spotify_client_id
SPOTIFY_CLIENT_SECRET = tu_spotify_client_secret

2. El archivo credentials.txt con el mismo formato.

Para obtener las credenciales, visitá:
- Spotify: https://developer.spotify.com/dashboard
`
} as const;
