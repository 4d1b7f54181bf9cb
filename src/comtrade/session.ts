import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import type {
    ConfigurationDocument,
    DecodedRecording,
    RecordingView,
    ReadonlySeries,
    MergePolicy,
} from '../comtrade-types.js';
import { CONFIG_EXTENSION, DATA_EXTENSION } from './format.js';
import { loadConfig } from './config.js';
import { RecordDecoder } from './record-decoder.js';
import { mergeChannels, exportCsv, writeCsvFile } from './csv-export.js';
import {
    ComtradeError,
    MissingFileError,
    NotComtradeError,
    StructuralMismatchError,
    UnsupportedEncodingError,
    IncompleteDataError,
    SampleRateError,
    LimitExceededError,
} from './errors.js';
import {
    resolveDecoderOptions,
    type ComtradeSessionOptions,
    type CsvExportOptions,
    type ResolvedDecoderOptions,
} from './types.js';

export type SessionStatus =
    | 'none'
    | 'parsed'
    | 'not_comtrade'
    | 'missing_file'
    | 'structural_mismatch'
    | 'field_format'
    | 'unsupported_encoding'
    | 'truncated'
    | 'invalid_timing'
    | 'limit_exceeded'
    | 'config_failed';

export interface ComtradePaths {
    /** Path without extension */
    base: string;
    configPath: string;
    dataPath: string;
}

/**
 * Derives the .cfg/.dat pair from either member. The sibling keeps the
 * case of the given extension, falling back to the other case when only
 * that one exists on disk. Returns null for any other extension.
 */
export function resolveComtradePaths(filePath: string): ComtradePaths | null {
    const ext = path.extname(filePath);
    const lower = ext.toLowerCase();
    if (lower !== CONFIG_EXTENSION && lower !== DATA_EXTENSION) return null;

    const base = filePath.slice(0, -ext.length);
    const upper = ext !== lower;
    return {
        base,
        configPath: lower === CONFIG_EXTENSION ? filePath : sibling(base, CONFIG_EXTENSION, upper),
        dataPath: lower === DATA_EXTENSION ? filePath : sibling(base, DATA_EXTENSION, upper),
    };
}

function sibling(base: string, ext: string, upper: boolean): string {
    const preferred = base + (upper ? ext.toUpperCase() : ext);
    if (existsSync(preferred)) return preferred;
    const other = base + (upper ? ext : ext.toUpperCase());
    return existsSync(other) ? other : preferred;
}

function dataFailureStatus(e: unknown): SessionStatus | null {
    if (e instanceof UnsupportedEncodingError) return 'unsupported_encoding';
    if (e instanceof IncompleteDataError) return 'truncated';
    if (e instanceof SampleRateError) return 'invalid_timing';
    if (e instanceof LimitExceededError) return 'limit_exceeded';
    if (e instanceof StructuralMismatchError) return 'structural_mismatch';
    return null;
}

function freezeRecording(recording: DecodedRecording): RecordingView {
    Object.freeze(recording.t);
    for (const values of recording.analog.values()) Object.freeze(values);
    for (const values of recording.digital.values()) Object.freeze(values);
    return Object.freeze(recording);
}

/**
 * One decoding session over a .cfg/.dat pair.
 *
 * Check `configStatus` and `dataStatus` (or `ok`) before using the output:
 * a failed session exposes empty maps and an empty time vector, never
 * partially decoded data.
 */
export class ComtradeSession {
    configStatus: SessionStatus = 'none';
    dataStatus: SessionStatus = 'none';
    error: ComtradeError | null = null;
    config: ConfigurationDocument | null = null;
    readonly paths: ComtradePaths | null;
    private recording: RecordingView | null = null;
    private readonly options: ResolvedDecoderOptions;
    private readonly textEncoding: 'utf8' | 'latin1';

    private constructor(filePath: string, options: ComtradeSessionOptions) {
        this.options = resolveDecoderOptions(options);
        this.textEncoding = options.textEncoding ?? 'utf8';
        this.paths = resolveComtradePaths(filePath);
        if (!this.paths) {
            this.fail('not_comtrade', new NotComtradeError(filePath));
            this.dataStatus = 'not_comtrade';
        }
    }

    /**
     * Opens a recording from its .cfg or .dat path, parses the configuration
     * and decodes the sample file.
     */
    static open(filePath: string, options: ComtradeSessionOptions = {}): ComtradeSession {
        const session = new ComtradeSession(filePath, options);
        if (session.paths) {
            session.loadConfiguration(session.paths.configPath);
            session.loadData(session.paths.dataPath);
        }
        return session;
    }

    private loadConfiguration(configPath: string): void {
        const result = loadConfig(configPath, {
            logger: this.options.logger,
            textEncoding: this.textEncoding,
        });
        if (result.status !== 'parsed') {
            this.fail(result.status, result.error);
            return;
        }
        this.config = result.config;
        this.configStatus = 'parsed';
    }

    private loadData(dataPath: string): void {
        if (!this.config) {
            this.dataStatus = 'config_failed';
            return;
        }
        if (!existsSync(dataPath)) {
            this.failData('missing_file', new MissingFileError(dataPath));
            return;
        }

        const bytes = readFileSync(dataPath);
        try {
            this.recording = freezeRecording(new RecordDecoder(this.config, this.options).decode(bytes));
            this.dataStatus = 'parsed';
        } catch (e) {
            const status = dataFailureStatus(e);
            if (status === null || !(e instanceof ComtradeError)) throw e;
            this.failData(status, e);
        }
    }

    private fail(status: SessionStatus, error: ComtradeError): void {
        this.configStatus = status;
        this.error = error;
        this.options.logger?.error?.(`[SESSION] ${error.message}`);
    }

    private failData(status: SessionStatus, error: ComtradeError): void {
        this.dataStatus = status;
        this.error = error;
        this.options.logger?.error?.(`[SESSION] ${error.message}`);
    }

    get ok(): boolean {
        return this.configStatus === 'parsed' && this.dataStatus === 'parsed';
    }

    /** Sample instants in seconds; empty unless the session decoded. */
    get t(): readonly number[] {
        return this.recording ? this.recording.t : [];
    }

    get analog(): ReadonlySeries {
        return this.recording ? this.recording.analog : new Map();
    }

    get digital(): ReadonlySeries {
        return this.recording ? this.recording.digital : new Map();
    }

    /** Nominal rate of the active sample segment, or null without one. */
    get sampleRate(): number | null {
        if (!this.config || this.config.timing.kind === 'none') return null;
        return this.config.timing.active.rate;
    }

    get result(): RecordingView | null {
        return this.recording;
    }

    all(policy: MergePolicy = 'last-writer-wins'): Map<string, readonly number[]> {
        return mergeChannels(this.analog, this.digital, policy);
    }

    exportCsv(options: CsvExportOptions = {}): string {
        return exportCsv({ analog: this.analog, digital: this.digital }, options);
    }

    /**
     * Writes `<base>_<SELECTION>.csv` beside the recording.
     * Refuses to write an export for a session that did not decode.
     */
    async writeCsv(options: CsvExportOptions = {}): Promise<string> {
        if (!this.ok || !this.paths) {
            throw new ComtradeError(`Session not decoded (config: ${this.configStatus}, data: ${this.dataStatus})`, this.error);
        }
        return writeCsvFile(this.paths.base, { analog: this.analog, digital: this.digital }, {
            logger: this.options.logger,
            ...options,
        });
    }
}
