#!/usr/bin/env tsx
/**
 * casetree CLI
 *
 * Builds <work>/<id>/<subdir>/... from the configured CSVs, copies source
 * folders into place and writes one error CSV per stage.
 */

import { parseArgs } from 'node:util';
import { runBatch } from './commands/run.js';
import { checkConfig } from './commands/check-config.js';
import { errorMessage } from './utils/errors.js';

const USAGE = [
    'casetree v1.0.0',
    '',
    'Usage:',
    '  casetree run [--config <path>] [--skip-check]',
    '  casetree check-config [--config <path>]',
    '',
    'Options:',
    '  -c, --config <path>  Config file (default: casetree.config.yaml, searched upwards)',
    '      --skip-check     Do not run the existence check on the third CSV',
    '  -h, --help           Show this help',
].join('\n');

async function main(): Promise<void> {
    const { values, positionals } = parseArgs({
        args: process.argv.slice(2),
        allowPositionals: true,
        options: {
            config: { type: 'string', short: 'c' },
            'skip-check': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const command = positionals[0];

    if (values.help || command === undefined) {
        console.log(USAGE);
        process.exit(0);
    }

    switch (command) {
        case 'run':
            await runBatch({ configPath: values.config, skipCheck: values['skip-check'] ?? false });
            break;
        case 'check-config':
            await checkConfig({ configPath: values.config });
            break;
        default:
            console.error(`Unknown command: ${command}\n`);
            console.error(USAGE);
            process.exit(1);
    }
}

main().catch((err) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
