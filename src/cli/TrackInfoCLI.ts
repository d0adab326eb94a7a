import chalk from 'chalk';
import gradient from 'gradient-string';
import figlet from 'figlet';
import { createSpinner } from 'nanospinner';
import { ConfigManager } from '../config/ConfigManager.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import type { Credentials } from '../models/Auth.js';
import { SpotifyMetadataClient, type ClientOptions } from '../services/SpotifyMetadataClient.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { ErrorHandler } from '../utils/ErrorHandler.js';
import { ErrorLogger } from '../utils/ErrorLogger.js';
import { InteractiveMenu } from './InteractiveMenu.js';
import { renderSearchResults } from './TrackRenderer.js';

export interface CLIOptions {
    credentialsPath?: string;
    query?: string;
    limit?: number;
    help?: boolean;
    /** Se pasan tal cual a SpotifyMetadataClient.create */
    clientOptions?: ClientOptions;
    logDir?: string;
}

export class TrackInfoCLI {
    private options: Required<Pick<CLIOptions, 'credentialsPath' | 'limit' | 'help'>> & Pick<CLIOptions, 'query' | 'clientOptions'>;
    private configManager = new ConfigManager();
    private errorHandler = new ErrorHandler();
    private errorLogger: ErrorLogger;

    constructor(options: CLIOptions = {}) {
        this.options = {
            credentialsPath: options.credentialsPath || ConfigPaths.getCredentialsPath(),
            limit: options.limit ?? DEFAULT_CONFIG.DEFAULT_SEARCH_LIMIT,
            help: options.help ?? false,
            query: options.query,
            clientOptions: options.clientOptions
        };
        this.errorLogger = new ErrorLogger(options.logDir);
    }

    /**
     * Devuelve el código de salida del proceso
     */
    async main(): Promise<number> {
        if (this.options.help) {
            TrackInfoCLI.showHelp();
            return 0;
        }

        const credentials = await this.loadCredentials();
        if (!credentials) {
            return 1;
        }

        const spinner = createSpinner('Autenticando con Spotify...').start();
        let client: SpotifyMetadataClient;
        try {
            client = await SpotifyMetadataClient.create(credentials, this.options.clientOptions);
            spinner.success({ text: 'Autenticación exitosa' });
        } catch (error) {
            spinner.error({ text: 'No se pudo autenticar con Spotify' });
            await this.reportError(error);
            return 1;
        }

        if (this.options.query) {
            return this.runSingleSearch(client, this.options.query);
        }

        this.showWelcome();
        const menu = new InteractiveMenu({
            client,
            errorLogger: this.errorLogger,
            limit: this.options.limit
        });
        await menu.run();
        return 0;
    }

    private async runSingleSearch(client: SpotifyMetadataClient, query: string): Promise<number> {
        try {
            const tracks = await client.searchTrack(query, this.options.limit);
            renderSearchResults(tracks).forEach(line => console.log(line));
            return 0;
        } catch (error) {
            await this.reportError(error, 'searchTrack');
            return 1;
        }
    }

    showWelcome(): void {
        const title = figlet.textSync('Track Info', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default'
        });

        console.log(gradient.pastel.multiline(title));
        console.log(chalk.white(HELP_MESSAGES.DESCRIPTION));
        console.log(chalk.gray('─'.repeat(60)) + '\n');
    }

    /**
     * Carga las credenciales; si no hay ni variables de entorno ni archivo, crea el template
     */
    private async loadCredentials(): Promise<Credentials | undefined> {
        const credentialsPath = this.options.credentialsPath;

        try {
            return await this.configManager.loadCredentials(credentialsPath);
        } catch (error) {
            if (!(await this.configManager.checkCredentialsExistAsync(credentialsPath))) {
                const createdPath = await this.configManager.createCredentialsTemplate(credentialsPath);
                console.log(chalk.yellow(HELP_MESSAGES.CREDENTIALS_MISSING));
                console.log(chalk.white('📍 Se creó un template en: ') + chalk.cyan(createdPath));
                return undefined;
            }

            console.error(chalk.red('\n❌ Error al cargar credenciales:'));
            console.error(chalk.red(error instanceof Error ? error.message : 'Error desconocido'));
            console.log(chalk.white('📍 Archivo: ') + chalk.cyan(credentialsPath));
            return undefined;
        }
    }

    private async reportError(error: unknown, context: 'authenticate' | 'searchTrack' = 'authenticate'): Promise<void> {
        const classified = this.errorHandler.classifyError(error, context);
        await this.errorLogger.logError(classified, context);
        console.error(chalk.red('❌ ' + this.errorHandler.getFriendlyMessage(classified)));
        console.error(chalk.gray(`Detalles en: ${this.errorLogger.getLogPath()}`));
    }

    /**
     * Parse command line arguments
     */
    static parseArguments(args: string[]): CLIOptions {
        const options: CLIOptions = {};

        for (let i = 0; i < args.length; i++) {
            const arg = args[i];

            switch (arg) {
                case '--credentials':
                case '-c':
                    if (args[i + 1] !== undefined) {
                        options.credentialsPath = args[i + 1];
                        i++; // Skip next argument
                    }
                    break;

                case '--query':
                case '-q':
                    if (args[i + 1] !== undefined) {
                        options.query = args[i + 1];
                        i++;
                    }
                    break;

                case '--limit':
                case '-l': {
                    const limit = parseInt(args[i + 1], 10);
                    if (!isNaN(limit) && limit > 0) {
                        options.limit = limit;
                        i++;
                    }
                    break;
                }

                case '--help':
                case '-h':
                    options.help = true;
                    break;
            }
        }

        return options;
    }

    static showHelp(): void {
        const defaultCredentialsPath = ConfigPaths.getCredentialsPath();

        console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}\n`));
        console.log('Uso: spotify-track-info [opciones]\n');
        console.log('Opciones:');
        console.log('  -q, --query <texto>         Buscar una vez y mostrar los resultados (sin menú)');
        console.log(`  -l, --limit <num>           Límite de resultados pedido a Spotify (por defecto: ${DEFAULT_CONFIG.DEFAULT_SEARCH_LIMIT}, máximo mostrado: ${DEFAULT_CONFIG.MAX_SEARCH_RESULTS})`);
        console.log('  -c, --credentials <ruta>    Ruta al archivo de credenciales');
        console.log(`                              (por defecto: ${defaultCredentialsPath})`);
        console.log('  -h, --help                  Mostrar este mensaje de ayuda\n');
        console.log('📁 Configuración:');
        console.log('   SPOTIFY_CLIENT_ID y SPOTIFY_CLIENT_SECRET se leen del entorno (o de .env)');
        console.log(`   o del archivo ${chalk.cyan(defaultCredentialsPath)}\n`);
        console.log('Ejemplos:');
        console.log('  spotify-track-info');
        console.log('  spotify-track-info --query "bohemian rhapsody" --limit 10');
        console.log('  spotify-track-info --credentials ./mis-credenciales.txt\n');
    }
}
