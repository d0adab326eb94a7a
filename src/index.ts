export { SpotifyMetadataClient } from './services/SpotifyMetadataClient.js';
export type { ClientOptions } from './services/SpotifyMetadataClient.js';
export { ConfigManager } from './config/ConfigManager.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export * from './models/index.js';
export * from './utils/index.js';
