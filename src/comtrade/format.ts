export const CONFIG_EXTENSION = '.cfg';
export const DATA_EXTENSION = '.dat';

// Sample record layout:
// [sample_number (u32)] [timestamp (u32)] [analog_0 (i16)] ... [analog_n (i16)] [digital_word_0 (i16)] ...
export const RECORD_PREFIX_SIZE = 4 + 4;
export const SAMPLE_WORD_SIZE = 2;
export const DIGITAL_CHANNELS_PER_WORD = 16;

/** Sample-body encoding this decoder understands (16-bit signed integers). */
export const SUPPORTED_ENCODING = 'binary';

export const FIELD_SEPARATOR = ',';

/**
 * Minimum number of comma-separated fields per descriptor line.
 * Extra fields are ignored.
 */
export const FIELD_COUNTS = {
    FILE_IDENTITY: 3,
    CHANNEL_LAYOUT: 3,
    ANALOG_CHANNEL: 13,
    DIGITAL_CHANNEL: 5,
    SAMPLE_RATE: 2,
    TIMESTAMP: 2,
} as const;

export const ANALOG_MARKER = 'A';
export const DIGITAL_MARKER = 'D';

export enum ConfigLine {
    FILE_IDENTITY = 'file identity',
    CHANNEL_LAYOUT = 'channel layout',
    ANALOG_CHANNEL = 'analog channel',
    DIGITAL_CHANNEL = 'digital channel',
    LINE_FREQUENCY = 'line frequency',
    SEGMENT_COUNT = 'sample rate count',
    SAMPLE_RATE = 'sample rate',
    START_TIME = 'start timestamp',
    TRIGGER_TIME = 'trigger timestamp',
    DATA_ENCODING = 'data encoding',
    TIME_MULTIPLIER = 'time multiplier',
}

/**
 * Computes the byte stride of one sample record.
 */
export function recordStride(analogCount: number, digitalCount: number): RecordLayout {
    const analogBytes = SAMPLE_WORD_SIZE * analogCount;
    const digitalBytes = SAMPLE_WORD_SIZE * Math.ceil(digitalCount / DIGITAL_CHANNELS_PER_WORD);
    return {
        analogBytes,
        digitalBytes,
        unitSize: RECORD_PREFIX_SIZE + analogBytes + digitalBytes,
    };
}

export interface RecordLayout {
    analogBytes: number;
    digitalBytes: number;
    unitSize: number;
}
