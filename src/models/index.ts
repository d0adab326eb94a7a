// Core data models
export * from './Track.js';
export * from './Auth.js';

// Service-specific types
export * from './SpotifyTypes.js';
