/**
 * COMTRADE Types - Core type definitions
 *
 * Typed description of an IEEE C37.111 configuration file and of the
 * decoded channel data it describes.
 */

// ============================================================================
// Configuration document
// ============================================================================

export interface FileIdentity {
    stationName: string;
    /** Recording device identifier, kept as written (some recorders use non-numeric ids) */
    deviceId: string;
    /** Standard revision year, e.g. "1999". Empty when the third field is left blank. */
    revisionYear: string;
}

/**
 * Channel counts from line 2 of the configuration.
 * When the declared total disagrees with analog + digital, every count is 0
 * and `consistent` is false.
 */
export interface ChannelLayout {
    total: number;
    analog: number;
    digital: number;
    consistent: boolean;
}

export interface AnalogChannelDescriptor {
    /** 1-based channel index as declared */
    index: number;
    id: string;
    phase: string;
    /** Circuit component being monitored */
    circuit: string;
    unit: string;
    /** Calibration multiplier */
    a: number;
    /** Calibration offset */
    b: number;
    /** Time skew between channels, in microseconds */
    skew: number;
    min: number;
    max: number;
    primary: number;
    secondary: number;
    /** 'p' when calibrated values are primary, 's' for secondary */
    primaryOrSecondary: string;
}

export interface DigitalChannelDescriptor {
    index: number;
    id: string;
    phase: string;
    circuit: string;
    /** Normal (non-asserted) state, 0 or 1 */
    normalState: number;
    /** Zero-based 16-bit word this channel is packed into */
    wordIndex: number;
    /** Zero-based bit position inside its word */
    bitPosition: number;
}

export interface SampleRateSegment {
    /** Sampling rate in Hz */
    rate: number;
    /** Number of the last sample taken at this rate */
    endSample: number;
}

/**
 * Which sample-rate segment drives decoding. Only the first declared segment
 * is honoured; any further ones are kept in `ignored` so callers can tell.
 */
export type SampleTiming =
    | { kind: 'none' }
    | { kind: 'single'; active: SampleRateSegment }
    | { kind: 'first-of-many'; active: SampleRateSegment; ignored: readonly SampleRateSegment[] };

export interface TimeStamp {
    day: number;
    month: number;
    year: number;
    hour: number;
    minute: number;
    /** Seconds including the fractional part */
    second: number;
}

/** Lower-cased data encoding token from the configuration ("binary", "ascii", ...) */
export type DataEncoding = string;

export interface ConfigurationDocument {
    readonly identity: Readonly<FileIdentity>;
    readonly layout: Readonly<ChannelLayout>;
    readonly analogChannels: readonly Readonly<AnalogChannelDescriptor>[];
    readonly digitalChannels: readonly Readonly<DigitalChannelDescriptor>[];
    /** Nominal line frequency in Hz */
    readonly lineFrequency: number;
    readonly sampleRates: readonly Readonly<SampleRateSegment>[];
    readonly timing: SampleTiming;
    readonly startTime: Readonly<TimeStamp>;
    readonly triggerTime: Readonly<TimeStamp>;
    readonly encoding: DataEncoding;
    readonly timeMultiplier: number;
    /** Path of the .cfg file when the document was loaded from disk */
    readonly path?: string;
}

// ============================================================================
// Decoded output
// ============================================================================

/** Analog values keyed by `"<id>(<unit>)"`, in channel order. */
export type AnalogSeries = Map<string, number[]>;

/** Digital 0/1 values keyed by channel id, in channel order. */
export type DigitalSeries = Map<string, number[]>;

/** Read-only view of either series, as exposed by a decoded session. */
export type ReadonlySeries = ReadonlyMap<string, readonly number[]>;

/**
 * How a digital channel's bit is located inside its packed word.
 * - `legacy-absolute`: tests bit `index` (the declared 1-based index) of the
 *   sign-extended word. Reproduces historical output, one bit above the
 *   standard position.
 * - `word-relative`: tests bit `(index - 1) % 16` of word `(index - 1) / 16`,
 *   the packing defined by the standard.
 */
export type DigitalBitAddressing = 'legacy-absolute' | 'word-relative';

export interface DecodedRecording {
    /** Sample instants in seconds: i / rate */
    t: number[];
    analog: AnalogSeries;
    digital: DigitalSeries;
    /** Nominal sample rate of the active segment, in Hz */
    sampleRate: number;
    /** Number of records decoded */
    sampleCount: number;
    /** Bytes per sample record */
    unitSize: number;
    /** Addressing mode the digital values were produced with */
    bitAddressing: DigitalBitAddressing;
}

/** A decoded recording as a session exposes it: nothing in it can be modified. */
export interface RecordingView extends Readonly<Omit<DecodedRecording, 't' | 'analog' | 'digital'>> {
    readonly t: readonly number[];
    readonly analog: ReadonlySeries;
    readonly digital: ReadonlySeries;
}

/** Policy for the combined analog + digital view when names collide. */
export type MergePolicy = 'last-writer-wins' | 'first-writer-wins' | 'reject';

export type ChannelSelection = 'analog' | 'digital' | 'all';
