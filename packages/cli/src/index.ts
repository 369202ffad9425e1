#!/usr/bin/env node
/**
 * GST Summarizer CLI
 *
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives ArrayBuffer, returns SummaryResult
 * - Core has no file system access, no console.* calls
 */

import { PREVIEW_ROW_LIMIT } from '@gst-summarizer/shared';
import { getSupportedExtensions } from '@gst-summarizer/core';
import { processFile } from './commands/process.js';
import { fetchOutput } from './commands/fetch.js';
import { purgeOutputs } from './commands/purge.js';
import { listAliases } from './commands/aliases.js';
import { parseArgs, stringFlag } from './utils/args.js';
import { fail } from './utils/console.js';
import { errorMessage } from './utils/errors.js';

function printUsage(): void {
    console.log('GST Summarizer CLI v1.0.0');
    console.log('');
    console.log('Usage:');
    console.log('  gstsum process <file> [--aliases <path>] [--workspace <dir>] [--preview <n>] [--max-age <min>] [--dry-run]');
    console.log('  gstsum fetch <token> [--workspace <dir>]');
    console.log('  gstsum purge [--max-age <min>] [--workspace <dir>]');
    console.log('  gstsum aliases [--aliases <path>] [--workspace <dir>]');
    console.log('');
    console.log(`Supported inputs: ${getSupportedExtensions().join(' ')}`);
    console.log('');
    console.log('Example:');
    console.log('  gstsum process sales_2026_01.xlsx');
}

async function main() {
    const args = parseArgs(process.argv.slice(2));
    const [command, target] = args.positionals;

    if (!command || args.flags['help']) {
        printUsage();
        process.exit(0);
    }

    const workspace = stringFlag(args, 'workspace');

    switch (command) {
        case 'process': {
            if (!target) {
                fail('Missing input file. Usage: gstsum process <file>');
                process.exit(1);
            }
            const previewFlag = stringFlag(args, 'preview');
            const preview = previewFlag === undefined ? PREVIEW_ROW_LIMIT : parseInt(previewFlag, 10);
            if (isNaN(preview) || preview < 0) {
                fail('--preview must be a non-negative number of rows.');
                process.exit(1);
            }
            await processFile(target, {
                dryRun: args.flags['dry-run'] === true,
                preview,
                aliases: stringFlag(args, 'aliases'),
                maxAge: stringFlag(args, 'max-age'),
                workspace,
            });
            break;
        }
        case 'fetch': {
            if (!target) {
                fail('Missing token. Usage: gstsum fetch <token>');
                process.exit(1);
            }
            await fetchOutput(target, { workspace });
            break;
        }
        case 'purge':
            await purgeOutputs({ maxAge: stringFlag(args, 'max-age'), workspace });
            break;
        case 'aliases':
            await listAliases({ aliases: stringFlag(args, 'aliases'), workspace });
            break;
        default:
            fail(`Unknown command "${command}".`);
            printUsage();
            process.exit(1);
    }
}

main().catch((err) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
