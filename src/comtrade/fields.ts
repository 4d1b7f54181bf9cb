/**
 * Primitive field parsers: one comma-delimited configuration line in, one
 * typed record out. Lines must carry at least the field count of their record
 * type; extra fields are ignored.
 */

import type {
    FileIdentity,
    ChannelLayout,
    AnalogChannelDescriptor,
    DigitalChannelDescriptor,
    SampleRateSegment,
    TimeStamp,
} from '../comtrade-types.js';
import {
    FIELD_SEPARATOR,
    FIELD_COUNTS,
    ANALOG_MARKER,
    DIGITAL_MARKER,
    DIGITAL_CHANNELS_PER_WORD,
    ConfigLine,
} from './format.js';
import { FieldCountError, FieldFormatError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function splitFields(line: string, record: string, minFields: number): string[] {
    const fields = stripTerminator(line).split(FIELD_SEPARATOR);
    if (fields.length < minFields) {
        throw new FieldCountError(record, minFields, fields.length);
    }
    return fields;
}

export function stripTerminator(line: string): string {
    return line.replace(/\r?\n$/, '').replace(/\r$/, '');
}

export function parseInteger(value: string, record: string, field: string): number {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        throw new FieldFormatError(record, field, value);
    }
    return parseInt(trimmed, 10);
}

export function parseFloatField(value: string, record: string, field: string): number {
    const trimmed = value.trim();
    if (!FLOAT_PATTERN.test(trimmed)) {
        throw new FieldFormatError(record, field, value);
    }
    return Number(trimmed);
}

export function parseFileIdentity(line: string): FileIdentity {
    const fields = splitFields(line, ConfigLine.FILE_IDENTITY, FIELD_COUNTS.FILE_IDENTITY);
    return {
        stationName: fields[0],
        deviceId: fields[1].trim(),
        revisionYear: fields[2].trim(),
    };
}

/**
 * Parses `total,<N>A,<M>D`. A count token without its marker letter counts as 0.
 * A total that disagrees with the two counts collapses the whole layout to zero.
 */
export function parseChannelLayout(line: string): ChannelLayout {
    const fields = splitFields(line, ConfigLine.CHANNEL_LAYOUT, FIELD_COUNTS.CHANNEL_LAYOUT);
    const total = parseInteger(fields[0], ConfigLine.CHANNEL_LAYOUT, 'total');
    const analog = parseMarkedCount(fields[1], ANALOG_MARKER, 'analog');
    const digital = parseMarkedCount(fields[2], DIGITAL_MARKER, 'digital');

    if (total !== analog + digital) {
        return { total: 0, analog: 0, digital: 0, consistent: false };
    }
    return { total, analog, digital, consistent: true };
}

function parseMarkedCount(token: string, marker: string, field: string): number {
    const upper = token.trim().toUpperCase();
    if (!upper.includes(marker)) return 0;
    return parseInteger(upper.replace(marker, ''), ConfigLine.CHANNEL_LAYOUT, field);
}

export function parseAnalogChannel(line: string): AnalogChannelDescriptor {
    const record = ConfigLine.ANALOG_CHANNEL;
    const f = splitFields(line, record, FIELD_COUNTS.ANALOG_CHANNEL);
    return {
        index: parseInteger(f[0], record, 'index'),
        id: f[1],
        phase: f[2],
        circuit: f[3],
        unit: f[4],
        a: parseFloatField(f[5], record, 'a'),
        b: parseFloatField(f[6], record, 'b'),
        skew: parseFloatField(f[7], record, 'skew'),
        min: parseFloatField(f[8], record, 'min'),
        max: parseFloatField(f[9], record, 'max'),
        primary: parseFloatField(f[10], record, 'primary'),
        secondary: parseFloatField(f[11], record, 'secondary'),
        primaryOrSecondary: f[12].trim().toLowerCase(),
    };
}

export function parseDigitalChannel(line: string): DigitalChannelDescriptor {
    const record = ConfigLine.DIGITAL_CHANNEL;
    const f = splitFields(line, record, FIELD_COUNTS.DIGITAL_CHANNEL);
    const index = parseInteger(f[0], record, 'index');
    if (index < 1) {
        throw new FieldFormatError(record, 'index', f[0]);
    }
    return {
        index,
        id: f[1],
        phase: f[2],
        circuit: f[3],
        normalState: parseInteger(f[4], record, 'normal_state'),
        wordIndex: Math.floor((index - 1) / DIGITAL_CHANNELS_PER_WORD),
        bitPosition: (index - 1) % DIGITAL_CHANNELS_PER_WORD,
    };
}

export function parseSampleRate(line: string): SampleRateSegment {
    const record = ConfigLine.SAMPLE_RATE;
    const f = splitFields(line, record, FIELD_COUNTS.SAMPLE_RATE);
    return {
        rate: parseFloatField(f[0], record, 'rate'),
        endSample: parseInteger(f[1], record, 'end_sample'),
    };
}

/**
 * Parses `dd/mm/yyyy,hh:mm:ss.ssssss`. No calendar validation.
 */
export function parseTimeStamp(line: string, record: string = ConfigLine.START_TIME): TimeStamp {
    const f = splitFields(line, record, FIELD_COUNTS.TIMESTAMP);
    const date = f[0].split('/');
    const time = f[1].split(':');
    if (date.length < 3) throw new FieldFormatError(record, 'date', f[0]);
    if (time.length < 3) throw new FieldFormatError(record, 'time', f[1]);
    return {
        day: parseInteger(date[0], record, 'day'),
        month: parseInteger(date[1], record, 'month'),
        year: parseInteger(date[2], record, 'year'),
        hour: parseInteger(time[0], record, 'hour'),
        minute: parseInteger(time[1], record, 'minute'),
        second: parseFloatField(time[2], record, 'second'),
    };
}

// ============================================================================
// Human-readable summaries
// ============================================================================

export function describeIdentity(identity: FileIdentity): string {
    const lines = [
        `Station: ${identity.stationName}`,
        `Device ID: ${identity.deviceId}`,
    ];
    lines.push(identity.revisionYear
        ? `Standard: IEEE Std C37.111-${identity.revisionYear} COMTRADE`
        : 'Standard: IEEE Std C37.111-1991 COMTRADE');
    return lines.join('\n');
}

export function describeLayout(layout: ChannelLayout): string {
    const lines = [
        `${layout.total} channels:`,
        `Analog channels: ${layout.analog}`,
        `Digital channels: ${layout.digital}`,
    ];
    if (!layout.consistent) lines.push('(declared total did not match analog + digital; channels dropped)');
    return lines.join('\n');
}

export function describeSampleRate(segment: SampleRateSegment): string {
    return `Sample rate: ${segment.rate.toFixed(3)}Hz\nLast sample number: ${segment.endSample}`;
}

export function formatTimeStamp(ts: TimeStamp): string {
    const pad = (n: number, width = 2) => String(n).padStart(width, '0');
    const seconds = ts.second.toFixed(6).padStart(9, '0');
    return `${pad(ts.day)}/${pad(ts.month)}/${pad(ts.year, 4)},${pad(ts.hour)}:${pad(ts.minute)}:${seconds}`;
}
