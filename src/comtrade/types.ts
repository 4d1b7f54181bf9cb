import type { DigitalBitAddressing, ChannelSelection, MergePolicy } from '../comtrade-types.js';

export type ComtradeLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * Reproducible decoder presets.
 *
 * - `strict`: rejects unsupported encodings and truncated files (default)
 * - `legacy`: decodes whatever is there, the way historical tools did
 * - `standard`: strict, with digital bits addressed per word as the standard packs them
 */
export type DecoderPreset = 'strict' | 'legacy' | 'standard';

export const DECODER_PRESETS: Record<DecoderPreset, Pick<Required<ComtradeDecoderOptions>, 'digitalBitAddressing' | 'strictEncoding' | 'truncation'>> = {
    strict:   { digitalBitAddressing: 'legacy-absolute', strictEncoding: true,  truncation: 'error' },
    legacy:   { digitalBitAddressing: 'legacy-absolute', strictEncoding: false, truncation: 'partial' },
    standard: { digitalBitAddressing: 'word-relative',   strictEncoding: true,  truncation: 'error' },
};

export type ComtradeDecoderOptions = {
    /** Decoder preset. Explicit options below override the preset's values. */
    preset?: DecoderPreset;
    /** Digital bit addressing mode. Default: 'legacy-absolute'. */
    digitalBitAddressing?: DigitalBitAddressing;
    /**
     * When true (default), a configuration declaring any encoding other than
     * 'binary' is rejected. When false it is decoded as 16-bit integers anyway.
     */
    strictEncoding?: boolean;
    /**
     * Behaviour when the sample file holds fewer bytes than the configuration declares.
     * - 'error' (default): throw IncompleteDataError
     * - 'partial': decode the complete records only
     */
    truncation?: 'error' | 'partial';
    /** Upper bound on the declared sample count. Default: Infinity. */
    maxSamples?: number;
    /** Optional logger hook; the library itself never writes to the console. */
    logger?: ComtradeLogger | null;
};

export type ResolvedDecoderOptions = Required<Omit<ComtradeDecoderOptions, 'preset'>>;

/** Options for opening a recording from disk: decoder options plus how the .cfg is read. */
export type ComtradeSessionOptions = ComtradeDecoderOptions & {
    /** Text encoding of the .cfg file. Default: 'utf8'. */
    textEncoding?: 'utf8' | 'latin1';
};

export function resolveDecoderOptions(options: ComtradeDecoderOptions = {}): ResolvedDecoderOptions {
    const { preset = 'strict', ...explicit } = options;
    const defaults: ResolvedDecoderOptions = {
        ...DECODER_PRESETS[preset],
        maxSamples: Infinity,
        logger: null,
    };
    const resolved: ResolvedDecoderOptions = { ...defaults };
    // explicit undefined leaves the preset value in place
    if (explicit.digitalBitAddressing !== undefined) resolved.digitalBitAddressing = explicit.digitalBitAddressing;
    if (explicit.strictEncoding !== undefined) resolved.strictEncoding = explicit.strictEncoding;
    if (explicit.truncation !== undefined) resolved.truncation = explicit.truncation;
    if (explicit.maxSamples !== undefined) resolved.maxSamples = explicit.maxSamples;
    if (explicit.logger !== undefined) resolved.logger = explicit.logger;
    return resolved;
}

export type CompressionMode = 'none' | 'zstd';

export type CsvExportOptions = {
    /** Which channels to export. Default: 'analog'. */
    channels?: ChannelSelection;
    /** Collision policy for channels: 'all'. Default: 'last-writer-wins'. */
    mergePolicy?: MergePolicy;
    /** Output compression. Default: 'none'. */
    compression?: CompressionMode;
    /** Zstd compression level (1-22). Default: 3. */
    compressionLevel?: number;
    logger?: ComtradeLogger | null;
};
