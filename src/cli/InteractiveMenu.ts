import chalk from 'chalk';
import inquirer from 'inquirer';
import { createSpinner } from 'nanospinner';
import type { SpotifyMetadataClient } from '../services/SpotifyMetadataClient.js';
import type { TrackSummary } from '../models/Track.js';
import { ErrorHandler } from '../utils/ErrorHandler.js';
import type { ErrorLogger } from '../utils/ErrorLogger.js';
import { formatSummaryChoice, renderSearchResults, renderTrackInfo } from './TrackRenderer.js';

export interface MenuOptions {
    client: SpotifyMetadataClient;
    errorLogger: ErrorLogger;
    limit: number;
}

export class InteractiveMenu {
    private client: SpotifyMetadataClient;
    private errorLogger: ErrorLogger;
    private errorHandler = new ErrorHandler();
    private limit: number;

    constructor(options: MenuOptions) {
        this.client = options.client;
        this.errorLogger = options.errorLogger;
        this.limit = options.limit;
    }

    /**
     * Bucle principal: buscar, elegir y mostrar metadatos hasta que el usuario salga
     */
    async run(): Promise<void> {
        while (true) {
            const { query } = await inquirer.prompt<{ query: string }>([
                {
                    type: 'input',
                    name: 'query',
                    message: '¿Qué canción querés buscar?',
                    validate: (input: string) => input.trim().length > 0 || 'Escribí el nombre de una canción'
                }
            ]);

            await this.handleSearch(query.trim());

            const { again } = await inquirer.prompt<{ again: boolean }>([
                {
                    type: 'confirm',
                    name: 'again',
                    message: '¿Buscar otra canción?',
                    default: true
                }
            ]);

            if (!again) {
                console.log(chalk.yellow('\n👋 ¡Hasta luego!'));
                return;
            }
        }
    }

    private async handleSearch(query: string): Promise<void> {
        const spinner = createSpinner(`Buscando "${query}" en Spotify...`).start();

        let tracks: TrackSummary[];
        try {
            tracks = await this.client.searchTrack(query, this.limit);
            spinner.success({ text: `${tracks.length} canciones encontradas` });
        } catch (error) {
            spinner.error({ text: 'Error al buscar canciones' });
            await this.reportError(error, 'searchTrack');
            return;
        }

        if (tracks.length === 0) {
            renderSearchResults(tracks).forEach(line => console.log(line));
            return;
        }

        const { selected } = await inquirer.prompt<{ selected: TrackSummary | null }>([
            {
                type: 'list',
                name: 'selected',
                message: '¿Qué canción querés ver?',
                choices: [
                    ...tracks.map(track => ({
                        name: formatSummaryChoice(track),
                        value: track
                    })),
                    {
                        name: '⬅️ Volver',
                        value: null
                    }
                ],
                pageSize: 11
            }
        ]);

        if (!selected) return;

        await this.showTrackInfo(selected);
    }

    private async showTrackInfo(track: TrackSummary): Promise<void> {
        const spinner = createSpinner(`Obteniendo metadatos de "${track.name}"...`).start();

        try {
            const info = await this.client.getTrackInfo(track);
            spinner.success({ text: 'Metadatos obtenidos' });

            console.log('\n' + chalk.gray('─'.repeat(50)));
            renderTrackInfo(info).forEach(line => console.log(line));
            console.log(chalk.gray('─'.repeat(50)) + '\n');
        } catch (error) {
            spinner.error({ text: 'Error al obtener los metadatos' });
            await this.reportError(error, 'getTrackInfo');
        }
    }

    private async reportError(error: unknown, context: 'searchTrack' | 'getTrackInfo'): Promise<void> {
        const classified = this.errorHandler.classifyError(error, context);
        await this.errorLogger.logError(classified, context);
        console.error(chalk.red('Error:'), this.errorHandler.getFriendlyMessage(classified));
    }
}
