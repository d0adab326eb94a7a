import { isAxiosError } from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ConfigPaths } from './ConfigPaths.js';
import type { SpotifyMetadataError } from './ErrorHandler.js';

export interface ErrorLogEntry {
  timestamp: string;
  code: string;
  errorMessage: string;
  context?: string;
  method?: string;
  url?: string;
  params?: unknown;
  statusCode?: number;
  statusText?: string;
  responseData?: unknown;
}

/**
 * Guarda en un archivo JSON los requests fallidos.
 * Nunca escribe headers ni el cuerpo del request: ahí viajan el token y el client secret.
 */
export class ErrorLogger {
  constructor(
    private logDir: string = ConfigPaths.getLogsDir(),
    private logFile: string = DEFAULT_CONFIG.ERROR_LOG_FILE,
    private maxEntries: number = DEFAULT_CONFIG.MAX_ERROR_LOG_ENTRIES
  ) {}

  getLogPath(): string {
    return path.join(this.logDir, this.logFile);
  }

  async logError(error: SpotifyMetadataError, context?: string): Promise<void> {
    const logEntry: ErrorLogEntry = {
      timestamp: new Date().toISOString(),
      code: error.code,
      errorMessage: error.message,
      context
    };

    const original = error.originalError;
    if (isAxiosError(original)) {
      logEntry.method = original.config?.method?.toUpperCase() || 'UNKNOWN';
      logEntry.url = original.config?.url || 'UNKNOWN';
      logEntry.params = original.config?.params;
      logEntry.statusCode = original.response?.status;
      logEntry.statusText = original.response?.statusText;
      logEntry.responseData = original.response?.data;
    }

    try {
      await fs.mkdir(this.logDir, { recursive: true });
      await this.writeLogEntry(logEntry);
    } catch (logError) {
      console.error('❌ Error al registrar el error:', logError);
    }
  }

  private async writeLogEntry(logEntry: ErrorLogEntry): Promise<void> {
    let existingLogs = await this.readLogs();

    existingLogs.push(logEntry);

    // Mantener solo las últimas entradas para evitar que el archivo crezca demasiado
    if (existingLogs.length > this.maxEntries) {
      existingLogs = existingLogs.slice(-this.maxEntries);
    }

    await fs.writeFile(this.getLogPath(), JSON.stringify(existingLogs, null, 2), 'utf-8');
  }

  /**
   * Lee el archivo de logs; si no existe o no es un array JSON, devuelve []
   */
  private async readLogs(): Promise<ErrorLogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.getLogPath(), 'utf-8');
    } catch {
      return [];
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return Array.isArray(parsed) ? parsed : [];
    } catch {
      return [];
    }
  }

  async getRecentLogs(limit: number = 10): Promise<ErrorLogEntry[]> {
    const logs = await this.readLogs();
    return logs.slice(-limit);
  }

  async clearLogs(): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    await fs.writeFile(this.getLogPath(), '[]', 'utf-8');
  }
}
