import { describe, it, expect } from 'vitest';
import {
  buildInsertStatements,
  renderInsert,
  toPreparedStatement,
} from '../../../src/lib/emitter/statements.js';
import type { TableGraph } from '../../../src/types/data-model.js';
import { LISTING_A, LISTING_B, graphFor } from '../../helpers/fixtures.js';

describe('Insert Statements', () => {
  it('should render idempotent inserts with escaped literals', () => {
    expect(renderInsert({ table: 'Listings', columns: ['Id', 'Price'], values: ["O'Neil", 3] })).toBe(
      'INSERT OR IGNORE INTO "Listings" ("Id", "Price") VALUES (\'O\'\'Neil\', 3);',
    );
  });

  it('should render NULL for missing values', () => {
    expect(renderInsert({ table: 'Phones', columns: ['Number'], values: [null] })).toBe(
      'INSERT OR IGNORE INTO "Phones" ("Number") VALUES (NULL);',
    );
  });

  it('should build parameterized statements', () => {
    expect(toPreparedStatement({ table: 'Listings', columns: ['Id', 'Price'], values: ["O'Neil", 3] })).toEqual({
      sql: 'INSERT OR IGNORE INTO "Listings" ("Id", "Price") VALUES (?, ?);',
      params: ["O'Neil", 3],
    });
  });

  it('should order statements by table and columns by table column order', () => {
    const graph = graphFor([LISTING_A, LISTING_B]);
    const statements = buildInsertStatements(
      [
        { table: 'Listings', values: { Phones: '[1]', Id: 'A' } },
        { table: 'Phones', values: { PhonesGeneratedId: 1, PhoneNumber: '555' } },
      ],
      graph,
    );
    expect(statements).toEqual([
      { table: 'Phones', columns: ['PhoneNumber', 'PhonesGeneratedId'], values: ['555', 1] },
      { table: 'Listings', columns: ['Id', 'Phones'], values: ['A', '[1]'] },
    ]);
  });

  it('should only list columns the row has values for', () => {
    const graph = graphFor([LISTING_A, LISTING_B]);
    const statements = buildInsertStatements([{ table: 'Listings', values: { Id: 'C' } }], graph);
    expect(statements).toEqual([{ table: 'Listings', columns: ['Id'], values: ['C'] }]);
  });

  it('should skip rows without any known column', () => {
    const graph: TableGraph = graphFor([LISTING_A, LISTING_B]);
    expect(buildInsertStatements([{ table: 'Phones', values: { Fax: '1' } }], graph)).toEqual([]);
  });
});
