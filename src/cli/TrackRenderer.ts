import chalk from 'chalk';
import type { TrackInfo, TrackSummary } from '../models/Track.js';

export function formatSummaryChoice(track: TrackSummary): string {
  return `${track.position}. ${track.name} - ${track.artist} (${track.album})`;
}

/**
 * Tabla simple de resultados de búsqueda, una línea por canción
 */
export function renderSearchResults(tracks: TrackSummary[]): string[] {
  if (tracks.length === 0) {
    return [chalk.yellow('No se encontraron canciones para esa búsqueda.')];
  }

  return tracks.map(track =>
    `${chalk.gray(`${track.position}.`)} ${chalk.bold(track.name)} - ${track.artist} ${chalk.gray(`(${track.album})`)} ${chalk.dim(track.id)}`
  );
}

export function renderTrackInfo(info: TrackInfo): string[] {
  return [
    chalk.bold.green(`🎵 ${info.name}`),
    `${chalk.white('Artista:')}   ${info.artist}`,
    `${chalk.white('Duración:')}  ${info.duration}`,
    `${chalk.white('Lanzado:')}   ${info.releaseDate}`,
    `${chalk.white('Sello:')}     ${info.recordLabel}`,
    `${chalk.white('Portada:')}   ${chalk.cyan(info.image)}`,
    `${chalk.white('Track ID:')}  ${info.trackId}`,
    `${chalk.white('Álbum ID:')}  ${info.albumId}`
  ];
}
