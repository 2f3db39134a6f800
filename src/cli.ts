import { Command } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import { checkVersions } from './check';
import { loadRuntimeConfig, parsePayload, resolveDescriptor } from './config';
import { materialize } from './materialize';
import { publish } from './publish';
import { toRecord, toVersion } from './version';

export interface CLIStreams {
    readInput: () => Promise<string>;
    writeOutput: (text: string) => void;
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
}

const processStreams: CLIStreams = {
    readInput: () => readStream(process.stdin),
    writeOutput: (text) => {
        process.stdout.write(text + '\n');
    },
};

export function setupCLI(streams: CLIStreams = processStreams): Command {
    const program = new Command();

    const pkg: { version?: string } = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf8'));

    program
        .name('http-version-resource')
        .description('Detects new versions of an HTTP resource and downloads them with content verification. Payloads are read from stdin, results written to stdout.')
        .version(pkg.version || '0.1.0');

    program
        .command('check')
        .description('Report the versions of the resource that should now be known')
        .action(async () => {
            const runtime = loadRuntimeConfig();
            const payload = parsePayload(await streams.readInput());
            const descriptor = resolveDescriptor(payload.source, runtime);

            const versions = await checkVersions(descriptor, toVersion(payload.version ?? {}));
            streams.writeOutput(JSON.stringify(versions.map(toRecord)));
        });

    program
        .command('in <destination>')
        .description('Download the resource into <destination>/downloaded and verify it against the requested version')
        .action(async (destination: string) => {
            const runtime = loadRuntimeConfig();
            const payload = parsePayload(await streams.readInput());
            const descriptor = resolveDescriptor(payload.source, runtime);

            const result = await materialize(descriptor, payload.version ?? {}, path.resolve(process.cwd(), destination));
            streams.writeOutput(JSON.stringify(result));
        });

    program
        .command('out <source>')
        .description('Not supported: always fails')
        .action(async (source: string) => {
            await streams.readInput();
            await publish(source);
        });

    return program;
}
