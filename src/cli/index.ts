#!/usr/bin/env node

import dotenv from 'dotenv';
import chalk from 'chalk';
import { TrackInfoCLI } from './TrackInfoCLI.js';

dotenv.config();

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const options = TrackInfoCLI.parseArguments(args);

    const cli = new TrackInfoCLI(options);
    process.exitCode = await cli.main();
}

main().catch((error) => {
    console.error(chalk.red('Error fatal:'), error);
    process.exit(1);
});
