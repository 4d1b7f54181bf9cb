/**
 * Channel value pipeline: raw sample words in, physical values out.
 *
 * Buffers are owned by one decode run and bound to one descriptor; the
 * descriptors themselves stay immutable.
 */

import type {
    AnalogChannelDescriptor,
    DigitalChannelDescriptor,
    DigitalBitAddressing,
} from '../comtrade-types.js';

/** physical = raw * a + b */
export function calibrate(raw: number, channel: Pick<AnalogChannelDescriptor, 'a' | 'b'>): number {
    return raw * channel.a + channel.b;
}

/**
 * Extracts one digital channel's state from the signed 16-bit word covering it.
 *
 * `legacy-absolute` tests bit `index` of the sign-extended word, so indices
 * 15 and above read the sign bit and anything past 30 reads the word's sign.
 */
export function extractBit(
    word: number,
    channel: Pick<DigitalChannelDescriptor, 'index' | 'bitPosition'>,
    addressing: DigitalBitAddressing,
): 0 | 1 {
    if (addressing === 'word-relative') {
        return (word & (1 << channel.bitPosition)) !== 0 ? 1 : 0;
    }
    if (channel.index >= 31) {
        return word < 0 ? 1 : 0;
    }
    return (word & (1 << channel.index)) !== 0 ? 1 : 0;
}

/** Name an analog channel is published under: `"<id>(<unit>)"`. */
export function analogKey(channel: Pick<AnalogChannelDescriptor, 'id' | 'unit'>): string {
    return `${channel.id}(${channel.unit})`;
}

export function digitalKey(channel: Pick<DigitalChannelDescriptor, 'id'>): string {
    return channel.id;
}

export class AnalogChannelBuffer {
    private readonly values: number[] = [];

    constructor(public readonly channel: Readonly<AnalogChannelDescriptor>) { }

    get key(): string {
        return analogKey(this.channel);
    }

    get length(): number {
        return this.values.length;
    }

    appendRaw(raw: number): void {
        this.values.push(calibrate(raw, this.channel));
    }

    data(): number[] {
        return this.values.slice();
    }
}

export class DigitalChannelBuffer {
    private readonly values: number[] = [];

    constructor(
        public readonly channel: Readonly<DigitalChannelDescriptor>,
        private readonly addressing: DigitalBitAddressing,
    ) { }

    get key(): string {
        return digitalKey(this.channel);
    }

    get length(): number {
        return this.values.length;
    }

    appendWord(word: number): void {
        this.values.push(extractBit(word, this.channel, this.addressing));
    }

    data(): number[] {
        return this.values.slice();
    }
}
