import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import type { CompressionMode } from './types.js';
import { ComtradeError } from './errors.js';

export interface ExportCodec {
    mode: CompressionMode;
    /** Suffix appended to the exported file name */
    extension: string;
    compress(data: Uint8Array, level?: number): Promise<Uint8Array>;
    decompress(data: Uint8Array): Promise<Uint8Array>;
}

export const EXPORT_CODECS: Map<CompressionMode, ExportCodec> = new Map();

export const ExportCodecNone: ExportCodec = {
    mode: 'none',
    extension: '',
    async compress(data: Uint8Array) {
        return data;
    },
    async decompress(data: Uint8Array) {
        return data;
    },
};

let zstdModule: Promise<ZstdModule> | null = null;

// The emscripten module initialises once per process.
function getZstd(): Promise<ZstdModule> {
    if (!zstdModule) {
        zstdModule = new Promise((resolve) => {
            ZstdCodec.run((zstd) => resolve(zstd));
        });
    }
    return zstdModule;
}

export const ExportCodecZstd: ExportCodec = {
    mode: 'zstd',
    extension: '.zst',
    async compress(data: Uint8Array, level: number = 3) {
        if (!Number.isInteger(level) || level < 1 || level > 22) {
            throw new ComtradeError(`Zstd compression level must be an integer in 1..22, got ${level}`);
        }
        const zstd = await getZstd();
        const compressed = new zstd.Simple().compress(data, level);
        if (!compressed) throw new ComtradeError('Zstd compression failed');
        return compressed;
    },
    async decompress(data: Uint8Array) {
        const zstd = await getZstd();
        const decompressed = new zstd.Simple().decompress(data);
        if (!decompressed) throw new ComtradeError('Zstd decompression failed');
        return decompressed;
    },
};

EXPORT_CODECS.set('none', ExportCodecNone);
EXPORT_CODECS.set('zstd', ExportCodecZstd);

export function getExportCodec(mode: CompressionMode): ExportCodec {
    const codec = EXPORT_CODECS.get(mode);
    if (!codec) {
        throw new ComtradeError(`Unknown compression mode: ${mode}`);
    }
    return codec;
}
