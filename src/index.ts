/**
 * COMTRADE decoder public API
 *
 * @module comtrade
 */

import { parseConfigText, loadConfig } from './comtrade/config.js';
import { decodeRecords } from './comtrade/record-decoder.js';
import { ComtradeSession } from './comtrade/session.js';
import { exportCsv } from './comtrade/csv-export.js';
import type { ConfigurationDocument, DecodedRecording, RecordingView } from './comtrade-types.js';
import type { ComtradeDecoderOptions, ComtradeSessionOptions, CsvExportOptions } from './comtrade/types.js';

export type {
    FileIdentity,
    ChannelLayout,
    AnalogChannelDescriptor,
    DigitalChannelDescriptor,
    SampleRateSegment,
    SampleTiming,
    TimeStamp,
    DataEncoding,
    ConfigurationDocument,
    AnalogSeries,
    DigitalSeries,
    ReadonlySeries,
    RecordingView,
    DigitalBitAddressing,
    DecodedRecording,
    MergePolicy,
    ChannelSelection,
} from './comtrade-types.js';
export type {
    ComtradeLogger as Logger,
    ComtradeDecoderOptions as DecoderOptions,
    ComtradeSessionOptions as SessionOptions,
    CsvExportOptions,
    DecoderPreset,
    CompressionMode,
} from './comtrade/types.js';
export { DECODER_PRESETS } from './comtrade/types.js';
export {
    ComtradeError,
    MissingFileError,
    NotComtradeError,
    StructuralMismatchError,
    FieldCountError,
    FieldFormatError,
    UnsupportedEncodingError,
    IncompleteDataError,
    SampleRateError,
    LimitExceededError,
    ChannelCollisionError,
} from './comtrade/errors.js';
export {
    parseFileIdentity,
    parseChannelLayout,
    parseAnalogChannel,
    parseDigitalChannel,
    parseSampleRate,
    parseTimeStamp,
    describeIdentity,
    describeLayout,
    describeSampleRate,
    formatTimeStamp,
} from './comtrade/fields.js';
export { parseConfigLines, parseConfigText, loadConfig } from './comtrade/config.js';
export type { ConfigLoadResult, ConfigParseOptions, ConfigLoadOptions } from './comtrade/config.js';
export { RecordDecoder, decodeRecords } from './comtrade/record-decoder.js';
export { calibrate, extractBit, analogKey, digitalKey, AnalogChannelBuffer, DigitalChannelBuffer } from './comtrade/channels.js';
export { ComtradeSession, resolveComtradePaths } from './comtrade/session.js';
export type { SessionStatus, ComtradePaths } from './comtrade/session.js';
export { mergeChannels, selectChannels, formatFixed2, toCsv, exportCsv, writeCsvFile, csvFileName } from './comtrade/csv-export.js';
export { getExportCodec } from './comtrade/export-codecs.js';
export { recordStride } from './comtrade/format.js';

export const Comtrade = {
    /**
     * Opens a .cfg/.dat pair and decodes it. Inspect the session's status before use.
     */
    open: (filePath: string, options?: ComtradeSessionOptions): ComtradeSession => {
        return ComtradeSession.open(filePath, options);
    },

    /**
     * Parses configuration text. Throws on structural or field errors.
     */
    parseConfig: (text: string): ConfigurationDocument => parseConfigText(text),

    /**
     * Reads a .cfg file into a tagged load result.
     */
    loadConfig,

    /**
     * Decodes a 16-bit binary sample body against a parsed configuration.
     */
    decode: (config: ConfigurationDocument, data: Uint8Array, options?: ComtradeDecoderOptions): DecodedRecording => {
        return decodeRecords(config, data, options);
    },

    /**
     * Serializes decoded channels as CSV text.
     */
    toCsv: (recording: Pick<RecordingView, 'analog' | 'digital'>, options?: CsvExportOptions): string => {
        return exportCsv(recording, options);
    },
};

export default Comtrade;
