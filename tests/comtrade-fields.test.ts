/**
 * Primitive field parser tests
 *
 * One comma-delimited configuration line per call; short lines fail with
 * FieldCountError, malformed numbers with FieldFormatError.
 */
// NOTE: Vitest globals are enabled (see vitest.config.ts).
import {
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
} from '../src/comtrade/fields.js';
import { FieldCountError, FieldFormatError, StructuralMismatchError } from '../src/comtrade/errors.js';

describe('parseFileIdentity()', () => {
    it('reads station, device and revision year', () => {
        expect(parseFileIdentity('SUBSTATION_NORTH,118,1999')).toEqual({
            stationName: 'SUBSTATION_NORTH',
            deviceId: '118',
            revisionYear: '1999',
        });
    });

    it('requires the revision year field', () => {
        expect(() => parseFileIdentity('OLD_SITE,5')).toThrow(FieldCountError);
        expect(() => parseFileIdentity('OLD_SITE,5')).toThrow(
            expect.objectContaining({ expected: 3, actual: 2 }),
        );
    });

    it('reads a blank revision year as empty', () => {
        expect(parseFileIdentity('OLD_SITE,5,').revisionYear).toBe('');
    });

    it('keeps a non-numeric device id as written', () => {
        expect(parseFileIdentity('SITE, REL-670 ,2013').deviceId).toBe('REL-670');
    });

    it('strips a trailing CRLF', () => {
        expect(parseFileIdentity('S,1,2013\r\n').revisionYear).toBe('2013');
    });

    it('rejects a line with a single field', () => {
        expect(() => parseFileIdentity('ONLY')).toThrow(FieldCountError);
    });
});

describe('parseChannelLayout()', () => {
    it('reads counts from marked tokens', () => {
        expect(parseChannelLayout('3,2A,1D')).toEqual({ total: 3, analog: 2, digital: 1, consistent: true });
    });

    it('collapses to zero when the total disagrees', () => {
        expect(parseChannelLayout('3,1A,1D')).toEqual({ total: 0, analog: 0, digital: 0, consistent: false });
    });

    it('counts a token without its marker letter as zero', () => {
        expect(parseChannelLayout('2,2A,0')).toEqual({ total: 2, analog: 2, digital: 0, consistent: true });
    });

    it('tolerates whitespace and lower-case markers', () => {
        expect(parseChannelLayout(' 4 , 3a , 1d ')).toEqual({ total: 4, analog: 3, digital: 1, consistent: true });
    });

    it('rejects a non-numeric total', () => {
        expect(() => parseChannelLayout('x,1A,1D')).toThrow(FieldFormatError);
    });

    it('rejects a non-numeric count prefix', () => {
        expect(() => parseChannelLayout('3,xA,1D')).toThrow(FieldFormatError);
    });

    it('reports a short line as a structural mismatch', () => {
        expect(() => parseChannelLayout('2,1A')).toThrow(StructuralMismatchError);
    });
});

describe('parseAnalogChannel()', () => {
    const line = '1,IA,A,LINE1,A,0.01,0,0,-32767,32767,600,5,S';

    it('reads every field', () => {
        expect(parseAnalogChannel(line)).toEqual({
            index: 1,
            id: 'IA',
            phase: 'A',
            circuit: 'LINE1',
            unit: 'A',
            a: 0.01,
            b: 0,
            skew: 0,
            min: -32767,
            max: 32767,
            primary: 600,
            secondary: 5,
            primaryOrSecondary: 's',
        });
    });

    it('ignores extra fields', () => {
        expect(parseAnalogChannel(line + ',extra,fields').primaryOrSecondary).toBe('s');
    });

    it('accepts exponent notation', () => {
        expect(parseAnalogChannel('2,V,,,kV,1e-3,-2.5E1,0,0,0,1,1,p')).toMatchObject({ a: 0.001, b: -25 });
    });

    it('reports the expected and actual field counts', () => {
        try {
            parseAnalogChannel('1,IA,A,LINE1,A,0.01,0,0,-32767,32767,600,5');
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(FieldCountError);
            expect(e).toMatchObject({ expected: 13, actual: 12 });
        }
    });

    it('names the malformed field', () => {
        expect(() => parseAnalogChannel('1,IA,A,LINE1,A,abc,0,0,-32767,32767,600,5,S'))
            .toThrow(expect.objectContaining({ name: 'FieldFormatError', field: 'a', value: 'abc' }));
    });

    it('rejects a fractional index', () => {
        expect(() => parseAnalogChannel('1.5,IA,A,LINE1,A,1,0,0,0,0,1,1,p')).toThrow(FieldFormatError);
    });
});

describe('parseDigitalChannel()', () => {
    it('derives word and bit position from the declared index', () => {
        expect(parseDigitalChannel('1,TRIP,,BRK1,0')).toMatchObject({ index: 1, wordIndex: 0, bitPosition: 0 });
        expect(parseDigitalChannel('16,D16,,,0')).toMatchObject({ wordIndex: 0, bitPosition: 15 });
        expect(parseDigitalChannel('17,D17,,,1')).toMatchObject({ wordIndex: 1, bitPosition: 0, normalState: 1 });
    });

    it('keeps text fields as written', () => {
        expect(parseDigitalChannel('2,CLOSE,B,BRK 1,1')).toEqual({
            index: 2,
            id: 'CLOSE',
            phase: 'B',
            circuit: 'BRK 1',
            normalState: 1,
            wordIndex: 0,
            bitPosition: 1,
        });
    });

    it('rejects an index below 1', () => {
        expect(() => parseDigitalChannel('0,D0,,,0')).toThrow(FieldFormatError);
    });

    it('rejects a short line', () => {
        expect(() => parseDigitalChannel('1,TRIP,0')).toThrow(FieldCountError);
    });
});

describe('parseSampleRate()', () => {
    it('reads rate and end sample', () => {
        expect(parseSampleRate('1200.5,600')).toEqual({ rate: 1200.5, endSample: 600 });
    });

    it('rejects a fractional end sample', () => {
        expect(() => parseSampleRate('1200,6.5')).toThrow(FieldFormatError);
    });
});

describe('parseTimeStamp()', () => {
    it('splits date and time fields', () => {
        expect(parseTimeStamp('15/03/2023,08:15:02.250000')).toEqual({
            day: 15, month: 3, year: 2023, hour: 8, minute: 15, second: 2.25,
        });
    });

    it('does not validate the calendar', () => {
        expect(parseTimeStamp('31/02/2023,25:61:75').day).toBe(31);
    });

    it('rejects a date with the wrong separator', () => {
        expect(() => parseTimeStamp('15-03-2023,08:15:02')).toThrow(
            expect.objectContaining({ field: 'date' }),
        );
    });

    it('rejects a time without seconds', () => {
        expect(() => parseTimeStamp('15/03/2023,08:15')).toThrow(
            expect.objectContaining({ field: 'time' }),
        );
    });
});

describe('summaries', () => {
    it('describes the file identity', () => {
        expect(describeIdentity({ stationName: 'S1', deviceId: '118', revisionYear: '1999' }))
            .toBe('Station: S1\nDevice ID: 118\nStandard: IEEE Std C37.111-1999 COMTRADE');
    });

    it('flags a collapsed layout', () => {
        expect(describeLayout({ total: 0, analog: 0, digital: 0, consistent: false })).toBe(
            '0 channels:\nAnalog channels: 0\nDigital channels: 0\n(declared total did not match analog + digital; channels dropped)',
        );
    });

    it('describes a sample rate segment', () => {
        expect(describeSampleRate({ rate: 2000, endSample: 400 })).toBe('Sample rate: 2000.000Hz\nLast sample number: 400');
    });

    it('formats a timestamp in configuration layout', () => {
        expect(formatTimeStamp({ day: 5, month: 3, year: 2023, hour: 8, minute: 15, second: 2.25 }))
            .toBe('05/03/2023,08:15:02.250000');
    });
});
