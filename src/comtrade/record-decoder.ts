import type {
    ConfigurationDocument,
    DecodedRecording,
    AnalogSeries,
    DigitalSeries,
} from '../comtrade-types.js';
import { RECORD_PREFIX_SIZE, SAMPLE_WORD_SIZE, DIGITAL_CHANNELS_PER_WORD, SUPPORTED_ENCODING, recordStride } from './format.js';
import { AnalogChannelBuffer, DigitalChannelBuffer } from './channels.js';
import {
    IncompleteDataError,
    LimitExceededError,
    SampleRateError,
    StructuralMismatchError,
    UnsupportedEncodingError,
} from './errors.js';
import { resolveDecoderOptions, type ComtradeDecoderOptions, type ResolvedDecoderOptions } from './types.js';

/**
 * Walks a 16-bit binary sample body record by record and reconstructs
 * calibrated channel values.
 *
 * Record layout (stride = unitSize):
 *   [sample# u32][timestamp u32][analog i16 × A][digital word i16 × ceil(D/16)]
 */
export class RecordDecoder {
    private readonly options: ResolvedDecoderOptions;

    constructor(
        private readonly config: ConfigurationDocument,
        options: ComtradeDecoderOptions = {},
    ) {
        this.options = resolveDecoderOptions(options);
    }

    decode(data: Uint8Array): DecodedRecording {
        const { config, options } = this;
        const logger = options.logger;

        this.checkEncoding();

        if (config.timing.kind === 'none') {
            throw new SampleRateError('No sample rate segment declared');
        }
        const { rate, endSample } = config.timing.active;
        if (!(rate > 0) || !Number.isFinite(rate)) {
            throw new SampleRateError(`Sample rate must be a positive number of Hz, got ${rate}`);
        }
        if (endSample < 0) {
            throw new SampleRateError(`Last sample number must not be negative, got ${endSample}`);
        }
        if (endSample > options.maxSamples) {
            throw new LimitExceededError(`Declared sample count ${endSample} exceeds limit ${options.maxSamples}`);
        }

        const analogCount = config.analogChannels.length;
        const digitalCount = config.digitalChannels.length;
        const { analogBytes, digitalBytes, unitSize } = recordStride(analogCount, digitalCount);
        const wordRelative = options.digitalBitAddressing === 'word-relative';
        if (wordRelative) {
            this.checkDigitalWords(digitalBytes / SAMPLE_WORD_SIZE);
        }

        let sampleCount = endSample;
        const available = Math.floor(data.length / unitSize);
        if (available < sampleCount) {
            if (options.truncation === 'error') {
                throw new IncompleteDataError(
                    `Sample data holds ${data.length} bytes; ${sampleCount} records of ${unitSize} bytes need ${sampleCount * unitSize}`,
                );
            }
            logger?.warn?.(`[DAT] Truncated sample data: decoding ${available} of ${sampleCount} records`);
            sampleCount = available;
        }

        const analogBuffers = config.analogChannels.map(ch => new AnalogChannelBuffer(ch));
        const digitalBuffers = config.digitalChannels.map(ch => new DigitalChannelBuffer(ch, options.digitalBitAddressing));

        const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        for (let i = 0; i < sampleCount; i++) {
            const analogBase = i * unitSize + RECORD_PREFIX_SIZE;
            for (let ch = 0; ch < analogCount; ch++) {
                analogBuffers[ch].appendRaw(view.getInt16(analogBase + ch * SAMPLE_WORD_SIZE, true));
            }

            const digitalBase = analogBase + analogBytes;
            for (let ch = 0; ch < digitalCount; ch++) {
                const buffer = digitalBuffers[ch];
                const word = wordRelative ? buffer.channel.wordIndex : Math.floor(ch / DIGITAL_CHANNELS_PER_WORD);
                buffer.appendWord(view.getInt16(digitalBase + word * SAMPLE_WORD_SIZE, true));
            }
        }

        const analog: AnalogSeries = new Map();
        for (const buffer of analogBuffers) analog.set(buffer.key, buffer.data());
        const digital: DigitalSeries = new Map();
        for (const buffer of digitalBuffers) digital.set(buffer.key, buffer.data());

        const deltaT = 1 / rate;
        const t = Array.from({ length: sampleCount }, (_, i) => i * deltaT);

        logger?.info?.(`[DAT] Decoded ${sampleCount} records (${analogCount}A/${digitalCount}D, stride ${unitSize}B) at ${rate}Hz`);

        return {
            t,
            analog,
            digital,
            sampleRate: rate,
            sampleCount,
            unitSize,
            bitAddressing: options.digitalBitAddressing,
        };
    }

    /** Declared indices past the record's digital words would read into the next record. */
    private checkDigitalWords(wordCount: number): void {
        for (const ch of this.config.digitalChannels) {
            if (ch.wordIndex >= wordCount) {
                throw new StructuralMismatchError(
                    `Digital channel ${ch.index} (${ch.id}) addresses word ${ch.wordIndex}, but records hold ${wordCount} digital words`,
                );
            }
        }
    }

    private checkEncoding(): void {
        const { encoding } = this.config;
        if (encoding === SUPPORTED_ENCODING) return;
        if (this.options.strictEncoding) {
            throw new UnsupportedEncodingError(encoding);
        }
        this.options.logger?.warn?.(`[DAT] Declared encoding '${encoding}' decoded as 16-bit binary`);
    }
}

/**
 * Decodes a sample body against a parsed configuration.
 */
export function decodeRecords(
    config: ConfigurationDocument,
    data: Uint8Array,
    options: ComtradeDecoderOptions = {},
): DecodedRecording {
    return new RecordDecoder(config, options).decode(data);
}
