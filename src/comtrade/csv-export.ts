/**
 * Tabular export of decoded channels.
 *
 * Output format (kept byte-compatible with historical exports):
 *   - header row: channel names joined by ','
 *   - one row per sample, values as '%.2f', joined by ','
 *   - '\n' after every row, no time column
 */

import { writeFile } from 'node:fs/promises';
import type { ReadonlySeries, ChannelSelection, MergePolicy } from '../comtrade-types.js';
import { ChannelCollisionError } from './errors.js';
import { getExportCodec } from './export-codecs.js';
import type { CsvExportOptions } from './types.js';

/**
 * Combined analog + digital view.
 *
 * - `last-writer-wins`: a digital channel replaces an analog one of the same
 *   name; the entry keeps the analog channel's position.
 * - `first-writer-wins`: the analog channel is kept.
 * - `reject`: a collision throws ChannelCollisionError.
 */
export function mergeChannels(
    analog: ReadonlySeries,
    digital: ReadonlySeries,
    policy: MergePolicy = 'last-writer-wins',
): Map<string, readonly number[]> {
    const merged = new Map<string, readonly number[]>(analog);
    for (const [key, values] of digital) {
        if (merged.has(key)) {
            if (policy === 'reject') throw new ChannelCollisionError(key);
            if (policy === 'first-writer-wins') continue;
        }
        merged.set(key, values);
    }
    return merged;
}

export function selectChannels(
    recording: { analog: ReadonlySeries; digital: ReadonlySeries },
    selection: ChannelSelection,
    policy: MergePolicy = 'last-writer-wins',
): ReadonlySeries {
    switch (selection) {
        case 'analog': return recording.analog;
        case 'digital': return recording.digital;
        case 'all': return mergeChannels(recording.analog, recording.digital, policy);
    }
}

/**
 * Formats like C's '%.2f': exact binary ties round half to even, negative
 * values that round to zero keep their sign.
 */
export function formatFixed2(value: number): string {
    if (Number.isNaN(value)) return 'nan';
    if (value === Infinity) return 'inf';
    if (value === -Infinity) return '-inf';

    const negative = value < 0 || Object.is(value, -0);
    const abs = Math.abs(value);
    const eighths = abs * 8;
    let text: string;
    if (Number.isInteger(eighths) && eighths % 2 === 1 && eighths < Number.MAX_SAFE_INTEGER) {
        // abs = n/8 with n odd: the third decimal is exactly 5
        const down = Math.floor(abs * 100);
        const cents = down % 2 === 0 ? down : down + 1;
        text = (cents / 100).toFixed(2);
    } else {
        text = abs.toFixed(2);
    }
    return negative ? `-${text}` : text;
}

export function toCsv(channels: ReadonlySeries): string {
    const columns = [...channels.values()];
    const rowCount = columns.length > 0 ? columns[0].length : 0;
    const lines: string[] = [[...channels.keys()].join(',') + '\n'];
    for (let i = 0; i < rowCount; i++) {
        lines.push(columns.map(col => formatFixed2(col[i])).join(',') + '\n');
    }
    return lines.join('');
}

export function exportCsv(
    recording: { analog: ReadonlySeries; digital: ReadonlySeries },
    options: CsvExportOptions = {},
): string {
    return toCsv(selectChannels(recording, options.channels ?? 'analog', options.mergePolicy ?? 'last-writer-wins'));
}

/** `<base>_<SELECTION>.csv`, plus the codec's suffix. */
export function csvFileName(basePath: string, selection: ChannelSelection, compression: CsvExportOptions['compression'] = 'none'): string {
    return `${basePath}_${selection.toUpperCase()}.csv${getExportCodec(compression).extension}`;
}

/**
 * Serializes the selected channels and writes them next to `basePath`.
 * Returns the path written.
 */
export async function writeCsvFile(
    basePath: string,
    recording: { analog: ReadonlySeries; digital: ReadonlySeries },
    options: CsvExportOptions = {},
): Promise<string> {
    const selection = options.channels ?? 'analog';
    const compression = options.compression ?? 'none';
    const codec = getExportCodec(compression);

    const csv = exportCsv(recording, options);
    const payload = await codec.compress(new TextEncoder().encode(csv), options.compressionLevel ?? 3);
    const target = csvFileName(basePath, selection, compression);
    await writeFile(target, payload);

    options.logger?.info?.(`[CSV] Wrote ${target} (${payload.length} bytes)`);
    return target;
}
