import os from 'os';
import path from 'path';
import fs from 'fs';

/**
 * Utilidad para manejar rutas de configuración del sistema
 */
export class ConfigPaths {
    private static readonly APP_NAME = 'spotify-track-info';

    /**
     * Obtiene la ruta del directorio de configuración de la aplicación
     */
    static getConfigDir(): string {
        const platform = os.platform();
        let configDir: string;

        switch (platform) {
            case 'win32':
                configDir = path.join(os.homedir(), 'AppData', 'Roaming', this.APP_NAME);
                break;
            case 'darwin':
                configDir = path.join(os.homedir(), 'Library', 'Application Support', this.APP_NAME);
                break;
            default: // Linux y otros Unix
                configDir = path.join(os.homedir(), '.config', this.APP_NAME);
                break;
        }

        return configDir;
    }

    static getCredentialsPath(): string {
        return path.join(this.getConfigDir(), 'credentials.txt');
    }

    static getLogsDir(): string {
        return path.join(this.getConfigDir(), 'logs');
    }

    /**
     * Crea el archivo de credenciales template si no existe (junto con su directorio)
     */
    static createCredentialsTemplate(credentialsPath: string = this.getCredentialsPath()): string {
        if (!fs.existsSync(credentialsPath)) {
            const template = `# Credenciales de API para Spotify Track Info
# Completá los valores con tus credenciales reales
# Obtené tus credenciales en: https://developer.spotify.com/dashboard

SPOTIFY_CLIENT_ID=tu_spotify_client_id_aqui
SPOTIFY_CLIENT_SECRET=tu_spotify_client_secret_aqui
`;

            fs.mkdirSync(path.dirname(credentialsPath), { recursive: true });
            fs.writeFileSync(credentialsPath, template, 'utf8');
        }

        return credentialsPath;
    }
}
