#!/usr/bin/env node
/**
 * texweave CLI - compose LaTeX documents from components
 *
 * Usage:
 *   texweave compose [project] [--target <name>] [--verbose]
 *   texweave tree [project] [--from <component>]
 *   texweave targets [project]
 *   texweave pages [project]
 *   texweave status
 */

import { getLoggingService } from '../utils/logger';
import { run } from './run';

async function main(): Promise<void> {
    try {
        process.exitCode = await run(process.argv.slice(2));
    } finally {
        getLoggingService().dispose();
    }
}

main().catch(error => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
