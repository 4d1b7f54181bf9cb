#!/usr/bin/env node
/**
 * CLI: COMTRADE recording inspector / exporter
 *
 * Usage:
 *   comtrade info <file.cfg|file.dat> [--preset strict|legacy|standard]
 *   comtrade export <file.cfg|file.dat> [--channels analog|digital|all] [--out base]
 *                   [--zstd] [--level N] [--preset name] [--bit-addressing legacy-absolute|word-relative]
 *
 * COMTRADE_PRESET sets the default preset.
 */

import {
    ComtradeSession,
    describeIdentity,
    describeLayout,
    describeSampleRate,
    formatTimeStamp,
    writeCsvFile,
} from './index.js';
import type { ChannelSelection, DigitalBitAddressing, ConfigurationDocument } from './comtrade-types.js';
import type { ComtradeDecoderOptions, ComtradeLogger, DecoderPreset } from './comtrade/types.js';

const PRESETS: readonly DecoderPreset[] = ['strict', 'legacy', 'standard'];
const SELECTIONS: readonly ChannelSelection[] = ['analog', 'digital', 'all'];
const ADDRESSING: readonly DigitalBitAddressing[] = ['legacy-absolute', 'word-relative'];

function usage(): never {
    console.error('Usage:');
    console.error('  comtrade info <file.cfg|file.dat> [--preset strict|legacy|standard]');
    console.error('  comtrade export <file.cfg|file.dat> [--channels analog|digital|all] [--out base] [--zstd] [--level N]');
    console.error('                  [--preset name] [--bit-addressing legacy-absolute|word-relative]');
    process.exit(1);
}

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : undefined;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], flag: string): T | undefined {
    if (value === undefined) return undefined;
    const match = allowed.find(a => a === value);
    if (!match) {
        console.error(`Invalid --${flag} '${value}' (expected ${allowed.join(' | ')})`);
        process.exit(1);
    }
    return match;
}

const stderrLogger: ComtradeLogger = {
    warn: (msg) => console.error(`warning: ${msg}`),
    error: (msg) => console.error(`error: ${msg}`),
};

function decoderOptions(): ComtradeDecoderOptions {
    return {
        preset: oneOf(getArg('preset') ?? process.env.COMTRADE_PRESET, PRESETS, 'preset'),
        digitalBitAddressing: oneOf(getArg('bit-addressing'), ADDRESSING, 'bit-addressing'),
        logger: stderrLogger,
    };
}

function printInfo(config: ConfigurationDocument): void {
    console.log(describeIdentity(config.identity));
    console.log(describeLayout(config.layout));
    for (const segment of config.sampleRates) console.log(describeSampleRate(segment));
    console.log(`Line frequency: ${config.lineFrequency}Hz`);
    console.log(`Start:   ${formatTimeStamp(config.startTime)}`);
    console.log(`Trigger: ${formatTimeStamp(config.triggerTime)}`);
    console.log(`Encoding: ${config.encoding}`);
    console.log('');
    console.log('IDX\tTYPE\tID\tUNIT\tA\tB');
    for (const ch of config.analogChannels) {
        console.log(`${ch.index}\tA\t${ch.id}\t${ch.unit}\t${ch.a}\t${ch.b}`);
    }
    for (const ch of config.digitalChannels) {
        console.log(`${ch.index}\tD\t${ch.id}\t\t\t`);
    }
}

async function main(): Promise<void> {
    const [command, file] = args;
    if (!command || !file || file.startsWith('--')) usage();

    const session = ComtradeSession.open(file, decoderOptions());

    if (command === 'info') {
        if (!session.config) {
            console.error(`Configuration not loaded: ${session.configStatus}`);
            process.exitCode = 2;
            return;
        }
        printInfo(session.config);
        console.log('');
        console.log(session.ok
            ? `Decoded ${session.t.length} samples at ${session.sampleRate}Hz`
            : `Sample data not decoded: ${session.dataStatus}`);
        return;
    }

    if (command === 'export') {
        if (!session.ok || !session.paths) {
            console.error(`Cannot export (config: ${session.configStatus}, data: ${session.dataStatus})`);
            process.exitCode = 2;
            return;
        }
        const level = getArg('level');
        const target = await writeCsvFile(getArg('out') ?? session.paths.base, session, {
            channels: oneOf(getArg('channels'), SELECTIONS, 'channels') ?? 'analog',
            compression: args.includes('--zstd') ? 'zstd' : 'none',
            compressionLevel: level !== undefined ? parseInt(level, 10) : undefined,
            logger: stderrLogger,
        });
        console.error(`Wrote ${target}`);
        return;
    }

    usage();
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
});
