import { promises as fs } from 'fs';
import type { Credentials } from '../models/Auth.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';

export interface ValidationResult {
  isValid: boolean;
  missingFields: string[];
  errors: string[];
}

const CLIENT_ID_FIELD = 'SPOTIFY_CLIENT_ID';
const CLIENT_SECRET_FIELD = 'SPOTIFY_CLIENT_SECRET';
const REQUIRED_FIELDS = [CLIENT_ID_FIELD, CLIENT_SECRET_FIELD];

export type Environment = Record<string, string | undefined>;

export class ConfigManager {
  getDefaultCredentialsPath(): string {
    return ConfigPaths.getCredentialsPath();
  }

  /**
   * Crea el archivo de credenciales template
   */
  async createCredentialsTemplate(filePath?: string): Promise<string> {
    try {
      return ConfigPaths.createCredentialsTemplate(filePath || this.getDefaultCredentialsPath());
    } catch (error) {
      throw new Error(`Error al crear el template de credenciales: ${error instanceof Error ? error.message : 'Error desconocido'}`);
    }
  }

  async checkCredentialsExistAsync(filePath?: string): Promise<boolean> {
    const credentialsPath = filePath || this.getDefaultCredentialsPath();
    try {
      await fs.access(credentialsPath, fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async validateCredentialsFile(filePath: string): Promise<ValidationResult> {
    const result: ValidationResult = {
      isValid: true,
      missingFields: [],
      errors: []
    };

    if (!(await this.checkCredentialsExistAsync(filePath))) {
      result.isValid = false;
      result.errors.push('Credentials file does not exist');
      return result;
    }

    try {
      const content = await fs.readFile(filePath, 'utf8');

      for (const field of REQUIRED_FIELDS) {
        const value = this.extractValue(content, field);
        if (value === undefined || this.isPlaceholder(value)) {
          result.missingFields.push(field);
          result.isValid = false;
        }
      }

      if (result.missingFields.length > 0) {
        result.errors.push(`Missing or empty credentials: ${result.missingFields.join(', ')}`);
      }
    } catch (error) {
      result.isValid = false;
      result.errors.push(`Failed to read credentials file: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    return result;
  }

  /**
   * Parses credentials from the file and returns a Credentials object
   */
  async parseCredentials(filePath: string): Promise<Credentials> {
    const validation = await this.validateCredentialsFile(filePath);
    if (!validation.isValid) {
      throw new Error(`Invalid credentials file: ${validation.errors.join(', ')}`);
    }

    const content = await fs.readFile(filePath, 'utf8');

    return {
      clientId: this.extractValue(content, CLIENT_ID_FIELD) ?? '',
      clientSecret: this.extractValue(content, CLIENT_SECRET_FIELD) ?? ''
    };
  }

  /**
   * Credenciales desde variables de entorno; si falta alguna, desde el archivo
   */
  async loadCredentials(filePath: string = this.getDefaultCredentialsPath(), env: Environment = process.env): Promise<Credentials> {
    const clientId = env[CLIENT_ID_FIELD]?.trim();
    const clientSecret = env[CLIENT_SECRET_FIELD]?.trim();

    if (clientId && clientSecret) {
      return { clientId, clientSecret };
    }

    return this.parseCredentials(filePath);
  }

  /**
   * Busca la línea `CAMPO = valor` (sin distinguir mayúsculas); las líneas con # se ignoran
   */
  private extractValue(content: string, field: string): string | undefined {
    const regex = new RegExp(`^\\s*${field}\\s*=\\s*(.*)$`, 'i');

    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.startsWith('#')) {
        continue;
      }
      const match = trimmed.match(regex);
      if (match) {
        return match[1] ? match[1].trim() : '';
      }
    }

    return undefined;
  }

  private isPlaceholder(value: string): boolean {
    return value === '' || value.includes('your_') || value.includes('tu_') || value.includes('_here') || value.includes('_aqui');
  }
}
