import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MalformedResponseError } from '@wildlife-telemetry/domain';
import type { VendorRequestContext } from '@wildlife-telemetry/domain';
import { extractRows, normalizeRowSet, parseLocations, parseTransmissions } from '../services/vendor/response-parser.js';
import { dataSetXml, locationRow, transmissionRow } from './fakes.js';

const context: VendorRequestContext = {
  integrationId: 'int-1',
  endpoint: 'https://vendor.test/DataPoints',
  username: 'test-user',
};

describe('response parser', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('normalizeRowSet', () => {
    it('keeps a list, wraps a single row, and drops scalars', () => {
      expect(normalizeRowSet([{ a: '1' }, { a: '2' }])).toEqual([{ a: '1' }, { a: '2' }]);
      expect(normalizeRowSet({ a: '1' })).toEqual([{ a: '1' }]);
      expect(normalizeRowSet('')).toEqual([]);
      expect(normalizeRowSet(undefined)).toEqual([]);
    });
  });

  describe('extractRows', () => {
    it('returns no rows when NewDataSet is empty', () => {
      const xml = '<DataSet><diffgr:diffgram><NewDataSet></NewDataSet></diffgr:diffgram></DataSet>';
      expect(extractRows(xml, 'data', context)).toEqual([]);
    });

    it('returns no rows when the diffgram is missing', () => {
      expect(extractRows('<DataSet></DataSet>', 'data', context)).toEqual([]);
    });

    it('rejects a document without a DataSet root', () => {
      expect(() => extractRows('<Error>maintenance</Error>', 'transmissions', context)).toThrow(
        "Error while parsing 'transmissions' response from XML. Integration ID: int-1 Username: test-user",
      );
    });

    it('rejects a body that is not XML', () => {
      expect(() => extractRows('<DataSet><unclosed></DataSet>', 'data', context)).toThrow(
        "Error while parsing XML from 'data' endpoint. Integration ID: int-1 Username: test-user",
      );
    });

    it('rejects an empty body and flags it for attention', () => {
      let caught: unknown;
      try {
        extractRows('   ', 'data', { integrationId: 'int-1' });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MalformedResponseError);
      expect(caught).toMatchObject({
        message: "Error while parsing XML from 'data' endpoint. Integration ID: int-1 Username: unknown",
        attentionNeeded: true,
        status: 422,
      });
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('parseLocations', () => {
    it('groups rows by device in order of first appearance', () => {
      const xml = dataSetXml([
        locationRow('002', '2024-03-05T14:30:00'),
        locationRow('001', '2024-03-05T15:00:00'),
        locationRow('002', '2024-03-05T16:00:00'),
      ]);

      const grouped = parseLocations(xml, context);

      expect([...grouped.keys()]).toEqual(['002', '001']);
      expect(grouped.get('002')?.map((r) => r.recordedAt.iso)).toEqual([
        '2024-03-05T14:30:00.000',
        '2024-03-05T16:00:00.000',
      ]);
    });

    it('produces the same grouping for the same response', () => {
      const xml = dataSetXml([
        locationRow('003', '2024-03-05T14:30:00'),
        locationRow('001', '2024-03-05T15:00:00'),
        locationRow('003', '2024-03-05T16:00:00'),
        locationRow('002', '2024-03-05T17:00:00'),
      ]);

      const first = parseLocations(xml, context);
      const second = parseLocations(xml, context);

      expect([...second.keys()]).toEqual(['003', '001', '002']);
      expect([...second.keys()]).toEqual([...first.keys()]);
      expect([...second.entries()]).toEqual([...first.entries()]);
    });

    it('accepts a response with a single row', () => {
      const grouped = parseLocations(dataSetXml([locationRow('001', '2024-03-05T14:30:00')]), context);
      expect(grouped.get('001')).toHaveLength(1);
    });

    it('maps vendor tags onto the record, keeping device ids as text', () => {
      const xml = dataSetXml([
        locationRow('012345', '2024-03-05T14:30:00', {
          NumSats: '7',
          Hdop: '',
          Mortality: 'No',
          LowBattVoltage: 'maybe',
          Temperature: '21',
        }),
      ]);

      const [record] = parseLocations(xml, context).get('012345') ?? [];

      expect(record).toEqual({
        deviceId: '012345',
        longitude: -104.5,
        latitude: 40.25,
        recordedAt: { iso: '2024-03-05T14:30:00.000', wallClockMs: Date.UTC(2024, 2, 5, 14, 30) },
        numSats: '7',
        hdop: undefined,
        fixTime: undefined,
        dimension: undefined,
        activity: undefined,
        temperature: '21',
        mortality: false,
        lowBattVoltage: 'maybe',
      });
    });

    it('treats empty coordinates as missing', () => {
      const xml = dataSetXml([locationRow('001', '2024-03-05T14:30:00', { Longitude: '', Latitude: '' })]);
      const [record] = parseLocations(xml, context).get('001') ?? [];
      expect(record?.longitude).toBeNull();
      expect(record?.latitude).toBeNull();
    });

    it('rejects the whole response when one row has an out-of-range latitude', () => {
      const xml = dataSetXml([
        locationRow('001', '2024-03-05T14:30:00'),
        locationRow('001', '2024-03-05T15:30:00', { Latitude: '91' }),
      ]);
      expect(() => parseLocations(xml, context)).toThrow(MalformedResponseError);
      expect(() => parseLocations(xml, context)).toThrow(/^Error while validating 'data' rows \(row 1, Latitude: /);
    });

    it('rejects an unparseable timestamp', () => {
      const xml = dataSetXml([locationRow('001', '2024-02-30T10:00:00')]);
      expect(() => parseLocations(xml, context)).toThrow(
        "Error while validating 'data' rows (row 0, DateYearAndJulian: unparseable timestamp '2024-02-30T10:00:00'). " +
          'Integration ID: int-1 Username: test-user',
      );
    });

    it('returns an empty map for an empty row set', () => {
      expect(parseLocations(dataSetXml([]), context).size).toBe(0);
    });
  });

  describe('parseTransmissions', () => {
    it('converts numeric fields and keeps the GMT offset', () => {
      const xml = dataSetXml([
        { ...transmissionRow('001', '2024-03-05 12:00:00', '-7'), BattVoltage: '3.61', LowBattVoltage: '1' },
      ]);

      expect(parseTransmissions(xml, context)).toEqual([
        {
          deviceId: '001',
          dateSent: { iso: '2024-03-05T12:00:00.000', wallClockMs: Date.UTC(2024, 2, 5, 12) },
          numberFixes: 4,
          battVoltage: 3.61,
          mortality: undefined,
          breakOff: undefined,
          satErrors: undefined,
          yearBase: undefined,
          dayBase: undefined,
          gmtOffset: -7,
          lowBattVoltage: true,
        },
      ]);
    });

    it('leaves the offset undefined when the vendor omits it', () => {
      const [record] = parseTransmissions(dataSetXml([transmissionRow('001', '2024-03-05T12:00:00')]), context);
      expect(record?.gmtOffset).toBeUndefined();
    });

    it('rejects a fractional GMT offset', () => {
      const xml = dataSetXml([transmissionRow('001', '2024-03-05T12:00:00', '5.5')]);
      expect(() => parseTransmissions(xml, context)).toThrow(
        "Error while validating 'transmissions' rows (row 0, GmtOffset: expected an integer). " +
          'Integration ID: int-1 Username: test-user',
      );
    });
  });
});
