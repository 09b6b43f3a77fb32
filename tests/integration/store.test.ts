import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { RawDocumentStore, openDatabase } from '../../src/lib/store/raw-store.js';
import { INGESTION_TABLE, SqliteOutputStore } from '../../src/lib/store/output-store.js';
import type { DocumentEmission } from '../../src/lib/emitter/types.js';
import { RowValidationError, StoreError } from '../../src/utils/errors.js';
import { LISTINGS_DDL, LISTING_A, LISTING_B, graphFor } from '../helpers/fixtures.js';

describe('Raw Document Store', () => {
  let store: RawDocumentStore;

  beforeEach(() => {
    store = new RawDocumentStore({ database: new Database(':memory:') });
    store.insert({ id: '10', body: { Id: 'C' }, lastUpdated: '2024-01-03' });
    store.insert({ id: '2', body: '{"Id": "B"}', lastUpdated: '2024-01-02' });
    store.insert({ id: '1', body: { Id: 'A' }, lastUpdated: '2024-01-01' });
  });

  afterEach(() => {
    store.close();
  });

  it('should read documents in id order with JSON text bodies', () => {
    expect([...store.documents()]).toEqual([
      { id: '1', body: '{"Id":"A"}', lastUpdated: '2024-01-01' },
      { id: '2', body: '{"Id": "B"}', lastUpdated: '2024-01-02' },
      { id: '10', body: '{"Id":"C"}', lastUpdated: '2024-01-03' },
    ]);
  });

  it('should only read documents updated after a timestamp', () => {
    expect([...store.documents({ since: '2024-01-01' })].map((d) => d.id)).toEqual(['2', '10']);
  });

  it('should limit the number of documents', () => {
    expect([...store.documents({ limit: 2 })].map((d) => d.id)).toEqual(['1', '2']);
  });

  it('should leave existing ids untouched', () => {
    store.insert({ id: '1', body: { Id: 'Z' }, lastUpdated: '2024-02-01' });
    expect(store.count()).toBe(3);
    expect(store.latestUpdate()).toBe('2024-01-03');
  });

  it('should fail when the document table is missing', () => {
    const empty = new RawDocumentStore({ database: new Database(':memory:'), readonly: true });
    expect(() => [...empty.documents()]).toThrow(StoreError);
    empty.close();
  });

  it('should require a path or database', () => {
    expect(() => openDatabase(undefined)).toThrow(StoreError);
  });
});

describe('SQLite Output Store', () => {
  const graph = graphFor([LISTING_A, LISTING_B]);
  let output: SqliteOutputStore;

  const emission: DocumentEmission = {
    documentId: '1',
    lastUpdated: '2024-01-01',
    statements: [
      { table: 'Phones', columns: ['PhoneNumber', 'PhonesGeneratedId'], values: ['555', 77] },
      { table: 'Listings', columns: ['Id', 'Phones'], values: ['A', '[77]'] },
    ],
    unmappedPaths: [],
  };

  beforeEach(() => {
    output = new SqliteOutputStore({ database: new Database(':memory:') });
    output.applyDdl(LISTINGS_DDL);
  });

  afterEach(() => {
    output.close();
  });

  it('should create tables and keep the ingestion table apart', () => {
    expect(output.tableNames()).toEqual(['Listings', 'Phones']);
    expect(output.tableNames(true)).toEqual(['Listings', 'Phones', INGESTION_TABLE]);
  });

  it('should insert a document and record its ingestion', () => {
    expect(output.insertDocument(emission)).toBe(2);
    expect(output.selectAll('Listings')).toEqual([{ Id: 'A', Phones: '[77]' }]);
    expect(output.selectAll('Phones')).toEqual([{ PhoneNumber: '555', PhonesGeneratedId: 77 }]);
    expect(output.hasDocument('1')).toBe(true);
    expect(output.hasDocument('2')).toBe(false);
    expect(output.getWatermark()).toBe('2024-01-01');
  });

  it('should ignore rows that are already stored', () => {
    output.insertDocument(emission);
    expect(output.insertDocument(emission)).toBe(0);
    expect(output.countRows('Listings')).toBe(1);
    expect(output.countRows('Phones')).toBe(1);
    expect(output.getMetrics()).toEqual({ documents: 2, statements: 4, insertedRows: 2, failedDocuments: 0 });
  });

  it('should keep nothing of a document that fails', () => {
    const broken: DocumentEmission = {
      ...emission,
      documentId: '9',
      statements: [
        { table: 'Listings', columns: ['Id', 'Phones'], values: ['Z', '[]'] },
        { table: 'Missing', columns: ['Id'], values: ['x'] },
      ],
    };
    expect(() => output.insertDocument(broken)).toThrow(StoreError);
    expect(output.countRows('Listings')).toBe(0);
    expect(output.hasDocument('9')).toBe(false);
    expect(output.getMetrics().failedDocuments).toBe(1);
  });

  it('should refuse documents that leave a NOT NULL column empty', () => {
    const missingKey: DocumentEmission = {
      ...emission,
      statements: [{ table: 'Listings', columns: ['Id', 'Phones'], values: [null, '[]'] }],
    };
    expect(() => output.insertDocument(missingKey)).toThrow(RowValidationError);
    expect(() => output.insertDocument(missingKey)).toThrow(
      'Document 1 has no value for NOT NULL column(s): Listings.Id',
    );
    expect(output.countRows('Listings')).toBe(0);
    expect(output.hasDocument('1')).toBe(false);
    expect(output.getMetrics().failedDocuments).toBe(2);
  });

  it('should report an empty watermark for a new store', () => {
    expect(output.getWatermark()).toBeNull();
  });

  it('should drop every table on reset', () => {
    output.insertDocument(emission);
    output.reset();
    expect(output.tableNames(true)).toEqual([INGESTION_TABLE]);
    expect(output.getWatermark()).toBeNull();
  });

  it('should add columns the graph gained', () => {
    const wider = graphFor([LISTING_A, LISTING_B, { Id: 'C', Phones: [], Price: '100' }]);
    expect(output.reconcileSchema(wider)).toEqual({ added: ['Listings.Price'], relaxed: [] });
    output.insertDocument({
      ...emission,
      statements: [{ table: 'Listings', columns: ['Id', 'Phones', 'Price'], values: ['C', '[]', '100'] }],
    });
    expect(output.selectAll('Listings')).toEqual([{ Id: 'C', Phones: '[]', Price: '100' }]);
    expect(output.reconcileSchema(wider)).toEqual({ added: [], relaxed: [] });
  });

  it('should drop NOT NULL from columns the graph now allows to be empty', () => {
    output.insertDocument(emission);
    const relaxed = graphFor([LISTING_A, LISTING_B, { Id: 'C' }]);

    expect(output.reconcileSchema(relaxed)).toEqual({ added: [], relaxed: ['Listings.Phones'] });
    expect(output.selectAll('Listings')).toEqual([{ Id: 'A', Phones: '[77]' }]);

    output.insertDocument({
      documentId: '3',
      lastUpdated: '2024-01-03',
      statements: [{ table: 'Listings', columns: ['Id', 'Phones'], values: ['C', null] }],
      unmappedPaths: [],
    });
    expect(output.selectAll('Listings')).toEqual([
      { Id: 'A', Phones: '[77]' },
      { Id: 'C', Phones: null },
    ]);
    expect(output.tableNames()).toEqual(['Listings', 'Phones']);
  });
  it('should wrap DDL failures', () => {
    expect(() => output.applyDdl(['CREATE TABLE nonsense ('])).toThrow('Failed to apply DDL');
  });

  it('should accept the DDL twice', () => {
    expect(() => output.applyDdl(LISTINGS_DDL)).not.toThrow();
    expect(graph.tables).toHaveLength(2);
  });
});
