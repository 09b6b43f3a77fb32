import { describe, it, expect } from 'vitest';
import {
  Normalizer,
  identityKeyOf,
  normalizeDocument,
  normalizeDocuments,
} from '../../src/lib/normalizer/index.js';
import { contentHash } from '../../src/utils/content-hash.js';
import { MalformedDocumentError } from '../../src/utils/errors.js';

describe('Normalizer', () => {
  describe('scalar lists', () => {
    it('should collapse short scalar lists into one delimited string', () => {
      expect(normalizeDocument({ Id: 'A', Tags: ['pool', 'garage'] })).toEqual({ Id: 'A', Tags: 'pool,garage' });
    });

    it('should render nulls as empty strings when collapsing', () => {
      expect(normalizeDocument({ Id: 'A', Tags: ['a', null, 3] }).Tags).toBe('a,,3');
    });

    it('should use the configured delimiter', () => {
      expect(normalizeDocument({ Id: 'A', Tags: ['a', 'b'] }, { delimiter: '|' }).Tags).toBe('a|b');
    });

    it('should wrap members of long scalar lists into rows', () => {
      const doc = normalizeDocument({ Id: 'A', Tags: ['a', 'b', 'c', 'd'] });
      expect(doc.Tags).toEqual(
        ['a', 'b', 'c', 'd'].map((value) => ({ Value: value, TagsGeneratedId: contentHash({ Value: value }) })),
      );
    });

    it('should wrap every scalar list when the threshold is zero', () => {
      const doc = normalizeDocument({ Id: 'A', Tags: ['a'] }, { collapseThreshold: 0 });
      expect(doc.Tags).toEqual([{ Value: 'a', TagsGeneratedId: contentHash({ Value: 'a' }) }]);
    });

    it('should keep empty lists', () => {
      expect(normalizeDocument({ Id: 'A', Tags: [] }).Tags).toEqual([]);
    });
  });

  describe('generated identifiers', () => {
    it('should give the root a content hash id when it has no identity key', () => {
      expect(normalizeDocument({ Name: 'x' })).toEqual({
        Name: 'x',
        ListingsGeneratedId: contentHash({ Name: 'x' }),
      });
    });

    it('should name the root id after the configured root table', () => {
      const doc = normalizeDocument({ Name: 'x' }, { rootTableName: 'Homes' });
      expect(doc.HomesGeneratedId).toBe(contentHash({ Name: 'x' }));
    });

    it('should produce identical output when run twice', () => {
      const raw = '{"Id": "A", "Phones": [{"PhoneNumber": "555", "PhonesGeneratedId": null}], "Tags": [1, 2, 3, 4]}';
      expect(JSON.stringify(normalizeDocument(raw))).toBe(JSON.stringify(normalizeDocument(raw)));
    });

    it('should hash the same content to the same id whatever the key order', () => {
      const first = normalizeDocument({ b: 1, a: { c: 2 } });
      const second = normalizeDocument({ a: { c: 2 }, b: 1 });
      expect(first.ListingsGeneratedId).toBe(second.ListingsGeneratedId);
    });

    it('should give list rows an id named after the list key', () => {
      const doc = normalizeDocument({ Id: 'A', Phones: [{ PhoneNumber: '555' }] });
      expect(doc.Phones).toEqual([{ PhoneNumber: '555', PhonesGeneratedId: contentHash({ PhoneNumber: '555' }) }]);
    });

    it('should keep natural identity keys instead of generating one', () => {
      const doc = normalizeDocument({ Id: 'A', Phones: [{ PhoneId: 7, Number: '1' }] });
      expect(doc.Phones).toEqual([{ PhoneId: 7, Number: '1' }]);
    });

    it('should leave nested dicts without ids', () => {
      const doc = normalizeDocument({ Id: 'A', Property: { Beds: 2 } });
      expect(doc).toEqual({ Id: 'A', Property: { Beds: 2 } });
    });

    it('should replace a null generated id with the content hash', () => {
      const doc = normalizeDocument({ Name: 'x', ListingsGeneratedId: null });
      expect(doc.ListingsGeneratedId).toBe(contentHash({ Name: 'x' }));
    });
  });

  describe('field rules', () => {
    it('should drop noise keys at any depth', () => {
      const doc = normalizeDocument({ Id: 'A', Tracking: 'x', Property: { Tracking: 'y', Beds: 1 } }, {
        noiseKeys: ['Tracking'],
      });
      expect(doc).toEqual({ Id: 'A', Property: { Beds: 1 } });
    });

    it('should pluck one property out of a list of objects', () => {
      const doc = normalizeDocument({ Id: 'A', Agents: [{ Name: 'Ann' }, { Name: 'Bob' }, {}] }, {
        fieldRules: { Agents: { effect: 'pluck', property: 'Name' } },
      });
      expect(doc.Agents).toBe('Ann,Bob,');
    });

    it('should wrap a lone object into a list of rows', () => {
      const doc = normalizeDocument({ Id: 'A', Property: { Parking: { Type: 'Garage' } } }, {
        fieldRules: { '$.Property.Parking': { effect: 'wrap' } },
      });
      expect(doc.Property).toEqual({
        Parking: [{ Type: 'Garage', ParkingGeneratedId: contentHash({ Type: 'Garage' }) }],
      });
    });

    it('should keep only the first member of a list', () => {
      const doc = normalizeDocument({ Id: 'A', Photos: [{ Url: 'a' }, { Url: 'b' }] }, {
        fieldRules: { Photos: { effect: 'first' } },
      });
      expect(doc.Photos).toEqual({ Url: 'a' });
    });

    it('should match path rules inside lists', () => {
      const doc = normalizeDocument({ Id: 'A', Individual: [{ IndividualId: 1, Organization: { Name: 'Acme' } }] }, {
        fieldRules: { '$.Individual.[].Organization': { effect: 'drop' } },
      });
      expect(doc.Individual).toEqual([{ IndividualId: 1 }]);
    });

    it('should prefer path rules over key rules', () => {
      const doc = normalizeDocument({ Id: 'A', Name: 'root', Agent: { Name: 'Ann' } }, {
        fieldRules: { Name: { effect: 'drop' }, '$.Agent.Name': { effect: 'first' } },
      });
      expect(doc).toEqual({ Id: 'A', Agent: { Name: 'Ann' } });
    });
  });

  describe('value effects', () => {
    it('should keep only the digits of an identifier', () => {
      const doc = normalizeDocument({ Id: 'A', MlsNumber: 'R2754123', Code: 'n/a' }, {
        fieldRules: { MlsNumber: { effect: 'digits' }, Code: { effect: 'digits' } },
      });
      expect(doc).toEqual({ Id: 'A', MlsNumber: 2754123, Code: null });
    });

    it('should keep digit runs beyond a safe integer as text', () => {
      const doc = normalizeDocument({ Id: 'A', Ref: '#12345678901234567890' }, {
        fieldRules: { Ref: { effect: 'digits' } },
      });
      expect(doc.Ref).toBe('12345678901234567890');
    });

    it('should rewrite 12-hour timestamps on keys matching a suffix rule', () => {
      const doc = normalizeDocument(
        { Id: 'A', LastDateUTC: '2024-03-05 1:07:09 PM', SoldDateUTC: '2024-03-05 12:00:00 AM', Note: '2024-03-05 1:07:09 PM' },
        { fieldRules: { '*DateUTC': { effect: 'isoDate', format: 'YYYY-MM-DD hh:mm:ss A' } } },
      );
      expect(doc).toEqual({
        Id: 'A',
        LastDateUTC: '2024-03-05T13:07:09',
        SoldDateUTC: '2024-03-05T00:00:00',
        Note: '2024-03-05 1:07:09 PM',
      });
    });

    it('should prefer key rules over suffix rules', () => {
      const doc = normalizeDocument({ Id: 'A', StartDateUTC: '25/12/2023 09:30:00 AM' }, {
        fieldRules: {
          '*DateUTC': { effect: 'isoDate', format: 'YYYY-MM-DD hh:mm:ss A' },
          StartDateUTC: { effect: 'isoDate', format: 'DD/MM/YYYY hh:mm:ss A' },
        },
      });
      expect(doc.StartDateUTC).toBe('2023-12-25T09:30:00');
    });

    it('should read tick counts as seconds since year one', () => {
      const doc = normalizeDocument({ Id: 'A', InsertedDateUTC: '638400000000000000' }, {
        fieldRules: { InsertedDateUTC: { effect: 'isoDate', format: 'ticks' } },
      });
      expect(doc.InsertedDateUTC).toBe('2024-01-04T21:20:00');
    });

    it('should leave dates that do not parse unchanged', () => {
      const doc = normalizeDocument({ Id: 'A', Listed: '31/02/2024', Updated: 'soon', Count: 3 }, {
        fieldRules: {
          Listed: { effect: 'isoDate', format: 'DD/MM/YYYY' },
          Updated: { effect: 'isoDate', format: 'YYYY-MM-DD HH:mm:ss' },
          Count: { effect: 'isoDate', format: 'YYYY' },
        },
      });
      expect(doc).toEqual({ Id: 'A', Listed: '31/02/2024', Updated: 'soon', Count: 3 });
    });

    it('should drop sub-keys of the first member', () => {
      const doc = normalizeDocument(
        {
          Id: 'A',
          Photo: [
            { SequenceId: 1, HighResPath: 'h1', MedResPath: 'm1', LowResPath: 'l1' },
            { SequenceId: 2, HighResPath: 'h2', MedResPath: 'm2', LowResPath: 'l2' },
          ],
          Gallery: [],
        },
        {
          fieldRules: {
            Photo: { effect: 'first', omit: ['LowResPath', 'MedResPath'] },
            Gallery: { effect: 'first', omit: ['LowResPath'] },
          },
        },
      );
      expect(doc).toEqual({ Id: 'A', Photo: { SequenceId: 1, HighResPath: 'h1' }, Gallery: null });
    });
  });

  describe('malformed input', () => {
    it('should parse JSON text bodies', () => {
      expect(normalizeDocument('{"Id": "A", "Tags": ["x"]}')).toEqual({ Id: 'A', Tags: 'x' });
    });

    it('should reject bodies that are not JSON', () => {
      expect(() => normalizeDocument('not json')).toThrow(MalformedDocumentError);
    });

    it('should reject roots that are not objects', () => {
      expect(() => normalizeDocument('[1, 2]')).toThrow('Document root must be an object, got array');
      expect(() => normalizeDocument(null)).toThrow('Document root must be an object, got null');
    });

    it('should name the path of non-finite numbers', () => {
      expect(() => normalizeDocument({ Id: 'A', Price: Infinity })).toThrow('Non-finite number at $.Price');
    });

    it('should reject values that are not JSON', () => {
      expect(() => normalizeDocument({ Id: 'A', Seen: new Date(0) })).toThrow(
        'Unsupported value of type Date at $.Seen',
      );
    });
  });

  describe('identityKeyOf', () => {
    it('should prefer the generated id key', () => {
      expect(identityKeyOf({ ListingsGeneratedId: 5, Id: 'A' }, null, 'Listings')).toBe('ListingsGeneratedId');
    });

    it('should skip null and non-scalar candidates', () => {
      expect(identityKeyOf({ Id: null, ID: 'x' }, null, 'Listings')).toBe('ID');
      expect(identityKeyOf({ Id: { Value: 1 } }, null, 'Listings')).toBeNull();
    });

    it('should match owner keys in singular form', () => {
      expect(identityKeyOf({ PhoneID: 'p1' }, 'Phones', 'Listings')).toBe('PhoneID');
    });
  });

  describe('Normalizer class', () => {
    it('should record malformed documents and keep going', () => {
      const normalizer = new Normalizer();
      expect(normalizer.normalizeOne({ id: '7', body: '[]', lastUpdated: '2024-01-01' })).toBeNull();
      expect(normalizer.getFailures()).toEqual([
        {
          documentId: '7',
          code: 'MALFORMED_DOCUMENT',
          message: 'Document root must be an object, got array',
          details: { path: '$' },
        },
      ]);
    });

    it('should normalize async streams', async () => {
      async function* source() {
        yield { id: '1', body: { Id: 'A' }, lastUpdated: '2024-01-01' };
        yield { id: '2', body: 'nope', lastUpdated: '2024-01-02' };
        yield { id: '3', body: { Id: 'C' }, lastUpdated: '2024-01-03' };
      }

      const normalizer = new Normalizer();
      const ids: string[] = [];
      for await (const entry of normalizer.normalizeStream(source())) {
        ids.push(entry.raw.id);
      }
      expect(ids).toEqual(['1', '3']);
      expect(normalizer.getFailures().map((f) => f.documentId)).toEqual(['2']);
    });
  });

  it('should normalize batches and report skipped documents', () => {
    const result = normalizeDocuments([
      { id: '1', body: { Id: 'A' }, lastUpdated: '2024-01-01' },
      { id: '2', body: 42, lastUpdated: '2024-01-02' },
    ]);
    expect(result.documents.map((entry) => entry.document)).toEqual([{ Id: 'A' }]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.message).toBe('Document root must be an object, got number');
  });
});
