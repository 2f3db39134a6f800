#!/usr/bin/env node
import { setupCLI } from './cli';
import { describeError } from './utils';

async function main() {
    const program = setupCLI();
    await program.parseAsync(process.argv);
}

main().catch(err => {
    console.error(`[ERROR] ${describeError(err)}`);
    process.exit(1);
});
