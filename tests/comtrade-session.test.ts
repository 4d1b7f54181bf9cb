/**
 * ComtradeSession: file pairing, status reporting and empty output on failure.
 */
import * as fs from 'fs';
import * as path from 'path';
import { expectTypeOf } from 'vitest';
import { ComtradeSession, resolveComtradePaths } from '../src/comtrade/session.js';
import {
    ComtradeError,
    IncompleteDataError,
    MissingFileError,
    NotComtradeError,
} from '../src/comtrade/errors.js';
import type { ReadonlySeries } from '../src/comtrade-types.js';
import { buildCfg, encodeRecords, makeTempDir, writeRecording, collectingLogger } from './helpers/test-utils.js';

const CFG = buildCfg({
    analog: [
        { id: 'IA', unit: 'A', a: 1, b: 0 },
        { id: 'VA', unit: 'V', a: 0.5, b: 0 },
    ],
    digital: [{ id: 'TRIP' }],
    segments: [[1000, 3]],
});
const DAT = encodeRecords([[10, 4], [20, -6], [30, 1]], [[2], [0], [2]]);

describe('resolveComtradePaths()', () => {
    it('pairs a .cfg with its .dat', () => {
        expect(resolveComtradePaths('/data/rec.cfg')).toEqual({
            base: '/data/rec',
            configPath: '/data/rec.cfg',
            dataPath: '/data/rec.dat',
        });
    });

    it('pairs a .dat with its .cfg', () => {
        expect(resolveComtradePaths('/data/rec.dat')?.configPath).toBe('/data/rec.cfg');
    });

    it('keeps the case of an upper-case extension', () => {
        expect(resolveComtradePaths('/data/REC.DAT')?.configPath).toBe('/data/REC.CFG');
    });

    it('rejects other extensions', () => {
        expect(resolveComtradePaths('/data/rec.csv')).toBeNull();
        expect(resolveComtradePaths('/data/rec')).toBeNull();
    });

    it('falls back to the sibling with the other case', () => {
        const dir = makeTempDir();
        fs.writeFileSync(path.join(dir, 'rec.cfg'), CFG);
        fs.writeFileSync(path.join(dir, 'rec.DAT'), DAT);
        expect(resolveComtradePaths(path.join(dir, 'rec.cfg'))?.dataPath).toBe(path.join(dir, 'rec.DAT'));
    });
});

describe('ComtradeSession.open()', () => {
    it('decodes a recording opened by its .cfg', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        const session = ComtradeSession.open(cfgPath);

        expect(session.configStatus).toBe('parsed');
        expect(session.dataStatus).toBe('parsed');
        expect(session.ok).toBe(true);
        expect(session.error).toBeNull();
        expect(session.sampleRate).toBe(1000);
        expect(session.t).toEqual([0, 0.001, 0.002]);
        expect(session.analog.get('IA(A)')).toEqual([10, 20, 30]);
        expect(session.analog.get('VA(V)')).toEqual([2, -3, 0.5]);
        expect(session.digital.get('TRIP')).toEqual([1, 0, 1]);
        expect(session.result?.unitSize).toBe(14);
    });

    it('decodes the same recording opened by its .dat', () => {
        const { datPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        const session = ComtradeSession.open(datPath);
        expect(session.ok).toBe(true);
        expect(session.analog.get('IA(A)')).toEqual([10, 20, 30]);
    });

    it('opens upper-case file pairs', () => {
        const dir = makeTempDir();
        fs.writeFileSync(path.join(dir, 'REC.CFG'), CFG);
        fs.writeFileSync(path.join(dir, 'REC.DAT'), DAT);
        const session = ComtradeSession.open(path.join(dir, 'REC.CFG'));
        expect(session.ok).toBe(true);
        expect(session.paths?.dataPath).toBe(path.join(dir, 'REC.DAT'));
    });

    it('merges analog and digital channels in all()', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        const all = ComtradeSession.open(cfgPath).all();
        expect([...all.keys()]).toEqual(['IA(A)', 'VA(V)', 'TRIP']);
    });

    it('reports a non-comtrade path for both stages', () => {
        const session = ComtradeSession.open('/data/rec.txt');
        expect(session.configStatus).toBe('not_comtrade');
        expect(session.dataStatus).toBe('not_comtrade');
        expect(session.error).toBeInstanceOf(NotComtradeError);
        expect(session.paths).toBeNull();
        expect(session.sampleRate).toBeNull();
    });

    it('reports a missing configuration and skips the data', () => {
        const dir = makeTempDir();
        const datPath = path.join(dir, 'rec.dat');
        fs.writeFileSync(datPath, DAT);
        const log = collectingLogger();

        const session = ComtradeSession.open(datPath, { logger: log.logger });
        expect(session.configStatus).toBe('missing_file');
        expect(session.dataStatus).toBe('config_failed');
        expect(session.error).toBeInstanceOf(MissingFileError);
        expect(session.config).toBeNull();
        expect(session.t).toEqual([]);
        expect(session.analog.size).toBe(0);
        expect(session.digital.size).toBe(0);
        expect(log.error).toEqual([`[SESSION] File not found: ${path.join(dir, 'rec.cfg')}`]);
    });

    it('keeps the configuration when the data file is missing', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG);
        const session = ComtradeSession.open(cfgPath);
        expect(session.configStatus).toBe('parsed');
        expect(session.dataStatus).toBe('missing_file');
        expect(session.config?.analogChannels).toHaveLength(2);
        expect(session.sampleRate).toBe(1000);
        expect(session.t).toEqual([]);
        expect(session.analog.size).toBe(0);
    });

    it('exposes no samples from a truncated file by default', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT.slice(0, 30));
        const session = ComtradeSession.open(cfgPath);
        expect(session.dataStatus).toBe('truncated');
        expect(session.error).toBeInstanceOf(IncompleteDataError);
        expect(session.analog.size).toBe(0);
        expect(session.t).toEqual([]);
    });

    it('decodes complete records of a truncated file under the legacy preset', () => {
        const log = collectingLogger();
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT.slice(0, 30));
        const session = ComtradeSession.open(cfgPath, { preset: 'legacy', logger: log.logger });
        expect(session.ok).toBe(true);
        expect(session.analog.get('IA(A)')).toEqual([10, 20]);
        expect(session.t).toEqual([0, 0.001]);
        expect(log.warn).toEqual(['[DAT] Truncated sample data: decoding 2 of 3 records']);
    });

    it('exposes decoded output read-only', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        const session = ComtradeSession.open(cfgPath);

        expectTypeOf(session.t).toEqualTypeOf<readonly number[]>();
        expectTypeOf(session.analog).toEqualTypeOf<ReadonlySeries>();
        expectTypeOf(session.digital).toEqualTypeOf<ReadonlySeries>();
        expect(Object.isFrozen(session.t)).toBe(true);
        expect(Object.isFrozen(session.analog.get('IA(A)'))).toBe(true);
        expect(Object.isFrozen(session.digital.get('TRIP'))).toBe(true);
        expect(Object.isFrozen(session.result)).toBe(true);
    });

    it('reads a latin1 configuration when asked', () => {
        const cfg = CFG.replace('TEST_STATION', 'Umspannwerk Süd');
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', '', DAT);
        fs.writeFileSync(cfgPath, Buffer.from(cfg, 'latin1'));

        const session = ComtradeSession.open(cfgPath, { textEncoding: 'latin1' });
        expect(session.ok).toBe(true);
        expect(session.config?.identity.stationName).toBe('Umspannwerk Süd');
    });

    it('reports an unsupported encoding', () => {
        const cfg = CFG.replace('BINARY', 'ASCII');
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', cfg, DAT);
        expect(ComtradeSession.open(cfgPath).dataStatus).toBe('unsupported_encoding');
    });

    it('reports a sample limit', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        expect(ComtradeSession.open(cfgPath, { maxSamples: 1 }).dataStatus).toBe('limit_exceeded');
    });
});

describe('ComtradeSession CSV export', () => {
    it('renders the analog channels by default', () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG, DAT);
        expect(ComtradeSession.open(cfgPath).exportCsv()).toBe(
            'IA(A),VA(V)\n10.00,2.00\n20.00,-3.00\n30.00,0.50\n',
        );
    });

    it('writes <base>_<SELECTION>.csv beside the recording', async () => {
        const dir = makeTempDir();
        const { cfgPath } = writeRecording(dir, 'rec', CFG, DAT);
        const target = await ComtradeSession.open(cfgPath).writeCsv({ channels: 'digital' });
        expect(target).toBe(path.join(dir, 'rec_DIGITAL.csv'));
        expect(fs.readFileSync(target, 'utf8')).toBe('TRIP\n1.00\n0.00\n1.00\n');
    });

    it('refuses to write for a session that did not decode', async () => {
        const { cfgPath } = writeRecording(makeTempDir(), 'rec', CFG);
        await expect(ComtradeSession.open(cfgPath).writeCsv()).rejects.toThrow(ComtradeError);
    });
});
