import type { ReleaseDatePrecision } from '../models/Track.js';
import { MalformedResponseError, UnsupportedDatePrecisionError } from './ErrorHandler.js';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const DATE_PATTERNS: Record<ReleaseDatePrecision, RegExp> = {
  day: /^(\d{4})-(\d{2})-(\d{2})$/,
  month: /^(\d{4})-(\d{2})$/,
  year: /^(\d{4})$/
};

export function isReleaseDatePrecision(value: string): value is ReleaseDatePrecision {
  return Object.prototype.hasOwnProperty.call(DATE_PATTERNS, value);
}

/**
 * Milisegundos a MM:SS (185000 -> "03:05")
 */
export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new MalformedResponseError(`Duración inválida: ${durationMs}`);
  }

  const minutes = Math.floor(durationMs / 60000);
  const seconds = Math.floor(durationMs / 1000) % 60;

  return `${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Formatear la fecha de lanzamiento según la precisión declarada por Spotify:
 * day -> "May 10, 2021", month -> "May 2021", year -> "2021"
 */
export function formatReleaseDate(date: string, precision: string): string {
  if (!isReleaseDatePrecision(precision)) {
    throw new UnsupportedDatePrecisionError(precision);
  }

  const match = DATE_PATTERNS[precision].exec(date);
  if (!match) {
    throw new MalformedResponseError(`La fecha "${date}" no coincide con la precisión "${precision}"`);
  }

  const year = match[1];
  if (precision === 'year') {
    return year;
  }

  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new MalformedResponseError(`Mes inválido en la fecha "${date}"`);
  }
  const monthName = MONTH_NAMES[month - 1];

  if (precision === 'month') {
    return `${monthName} ${year}`;
  }

  const day = Number(match[3]);
  if (day < 1 || day > daysInMonth(Number(year), month)) {
    throw new MalformedResponseError(`Día inválido en la fecha "${date}"`);
  }

  return `${monthName} ${pad(day)}, ${year}`;
}

function daysInMonth(year: number, month: number): number {
  // Día 0 del mes siguiente = último día de este mes
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}
