import { existsSync, readFileSync } from 'node:fs';
import type {
    AnalogChannelDescriptor,
    DigitalChannelDescriptor,
    ConfigurationDocument,
    SampleRateSegment,
    SampleTiming,
} from '../comtrade-types.js';
import { ConfigLine } from './format.js';
import {
    parseFileIdentity,
    parseChannelLayout,
    parseAnalogChannel,
    parseDigitalChannel,
    parseSampleRate,
    parseTimeStamp,
    parseInteger,
    parseFloatField,
    stripTerminator,
} from './fields.js';
import {
    MissingFileError,
    StructuralMismatchError,
    FieldFormatError,
} from './errors.js';
import type { ComtradeLogger } from './types.js';

export type ConfigParseOptions = {
    logger?: ComtradeLogger | null;
    /** Source path recorded on the document */
    path?: string;
};

export type ConfigLoadOptions = {
    logger?: ComtradeLogger | null;
    textEncoding?: 'utf8' | 'latin1';
};

export type ConfigFailureStatus = 'missing_file' | 'structural_mismatch' | 'field_format';

export type ConfigLoadResult =
    | { status: 'parsed'; config: ConfigurationDocument }
    | { status: ConfigFailureStatus; error: MissingFileError | StructuralMismatchError | FieldFormatError };

/**
 * Sequential cursor over configuration lines. Each read names the line it
 * expects so a short file reports what was missing. Trailing blank lines
 * count as end of input.
 */
class LineCursor {
    private pos = 0;
    private readonly end: number;

    constructor(private readonly lines: readonly string[]) {
        let end = lines.length;
        while (end > 0 && stripTerminator(lines[end - 1]).trim() === '') end--;
        this.end = end;
    }

    next(expected: ConfigLine, ordinal?: number): string {
        if (this.pos >= this.end) {
            const which = ordinal !== undefined ? `${expected} #${ordinal}` : expected;
            throw new StructuralMismatchError(
                `Configuration ended after ${this.end} lines; expected ${which} at line ${this.pos + 1}`,
            );
        }
        return stripTerminator(this.lines[this.pos++]);
    }
}

/**
 * Builds a configuration document from the ordered lines of a .cfg file.
 * Throws StructuralMismatchError or FieldFormatError; never returns a partial document.
 */
export function parseConfigLines(lines: readonly string[], options: ConfigParseOptions = {}): ConfigurationDocument {
    const logger = options.logger ?? null;
    const cursor = new LineCursor(lines);

    const identity = parseFileIdentity(cursor.next(ConfigLine.FILE_IDENTITY));
    const layout = parseChannelLayout(cursor.next(ConfigLine.CHANNEL_LAYOUT));
    if (!layout.consistent) {
        logger?.warn?.('[CFG] Channel total does not match analog + digital counts; decoding no channels');
    }

    const analogChannels: AnalogChannelDescriptor[] = [];
    for (let i = 0; i < layout.analog; i++) {
        analogChannels.push(parseAnalogChannel(cursor.next(ConfigLine.ANALOG_CHANNEL, i + 1)));
    }

    const digitalChannels: DigitalChannelDescriptor[] = [];
    for (let i = 0; i < layout.digital; i++) {
        digitalChannels.push(parseDigitalChannel(cursor.next(ConfigLine.DIGITAL_CHANNEL, i + 1)));
    }

    const lineFrequency = parseFloatField(cursor.next(ConfigLine.LINE_FREQUENCY), ConfigLine.LINE_FREQUENCY, 'lf');

    const segmentCountLine = cursor.next(ConfigLine.SEGMENT_COUNT);
    const segmentCount = parseInteger(segmentCountLine, ConfigLine.SEGMENT_COUNT, 'nrates');
    if (segmentCount < 0) {
        throw new FieldFormatError(ConfigLine.SEGMENT_COUNT, 'nrates', segmentCountLine);
    }

    const sampleRates: SampleRateSegment[] = [];
    for (let i = 0; i < segmentCount; i++) {
        sampleRates.push(parseSampleRate(cursor.next(ConfigLine.SAMPLE_RATE, i + 1)));
    }
    const timing = selectTiming(sampleRates);
    if (timing.kind === 'first-of-many') {
        logger?.warn?.(`[CFG] ${sampleRates.length} sample rate segments declared; only the first (${timing.active.rate}Hz) is used`);
    }

    const startTime = parseTimeStamp(cursor.next(ConfigLine.START_TIME), ConfigLine.START_TIME);
    const triggerTime = parseTimeStamp(cursor.next(ConfigLine.TRIGGER_TIME), ConfigLine.TRIGGER_TIME);
    const encoding = cursor.next(ConfigLine.DATA_ENCODING).trim().toLowerCase();
    const timeMultiplier = parseFloatField(cursor.next(ConfigLine.TIME_MULTIPLIER), ConfigLine.TIME_MULTIPLIER, 'timemult');

    const doc: ConfigurationDocument = {
        identity: Object.freeze(identity),
        layout: Object.freeze(layout),
        analogChannels: Object.freeze(analogChannels.map(ch => Object.freeze(ch))),
        digitalChannels: Object.freeze(digitalChannels.map(ch => Object.freeze(ch))),
        lineFrequency,
        sampleRates: Object.freeze(sampleRates.map(s => Object.freeze(s))),
        timing,
        startTime: Object.freeze(startTime),
        triggerTime: Object.freeze(triggerTime),
        encoding,
        timeMultiplier,
        ...(options.path !== undefined ? { path: options.path } : {}),
    };
    return Object.freeze(doc);
}

export function parseConfigText(text: string, options: ConfigParseOptions = {}): ConfigurationDocument {
    return parseConfigLines(text.split(/\r?\n/), options);
}

export function selectTiming(segments: readonly SampleRateSegment[]): SampleTiming {
    if (segments.length === 0) return { kind: 'none' };
    const [active, ...ignored] = segments;
    if (ignored.length === 0) return { kind: 'single', active };
    return { kind: 'first-of-many', active, ignored: Object.freeze(ignored) };
}

/**
 * Reads and parses a .cfg file. Failures are returned as a tagged result
 * rather than thrown; I/O errors other than a missing file still throw.
 */
export function loadConfig(path: string, options: ConfigLoadOptions = {}): ConfigLoadResult {
    if (!existsSync(path)) {
        return { status: 'missing_file', error: new MissingFileError(path) };
    }
    const text = readFileSync(path, { encoding: options.textEncoding ?? 'utf8' });

    try {
        return { status: 'parsed', config: parseConfigText(text, { logger: options.logger, path }) };
    } catch (e) {
        if (e instanceof StructuralMismatchError) return { status: 'structural_mismatch', error: e };
        if (e instanceof FieldFormatError) return { status: 'field_format', error: e };
        throw e;
    }
}
