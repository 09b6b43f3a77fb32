import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SqlScriptFile, SqlScriptWriter } from '../../../src/lib/emitter/sql-writer.js';
import { FileIOError } from '../../../src/utils/errors.js';
import type { DocumentEmission } from '../../../src/lib/emitter/types.js';

async function collect(writer: SqlScriptWriter, emissions: DocumentEmission[]): Promise<string> {
  const chunks: string[] = [];
  const reading = (async () => {
    for await (const chunk of writer) {
      chunks.push(String(chunk));
    }
  })();
  for (const emission of emissions) {
    writer.write(emission);
  }
  writer.end();
  await reading;
  return chunks.join('');
}

function emission(documentId: string, values: string[]): DocumentEmission {
  return {
    documentId,
    lastUpdated: '2024-01-01',
    statements: values.map((value) => ({ table: 'Listings', columns: ['Id'], values: [value] })),
    unmappedPaths: [],
  };
}

describe('SqlScriptWriter', () => {
  it('should write the DDL followed by one block per document', async () => {
    const writer = new SqlScriptWriter(['CREATE TABLE IF NOT EXISTS "Listings" ("Id" TEXT);']);
    const output = await collect(writer, [emission('1', ['A']), emission('2', ['B'])]);

    expect(output).toBe(
      [
        'CREATE TABLE IF NOT EXISTS "Listings" ("Id" TEXT);',
        '-- document 1',
        'INSERT OR IGNORE INTO "Listings" ("Id") VALUES (\'A\');',
        '-- document 2',
        'INSERT OR IGNORE INTO "Listings" ("Id") VALUES (\'B\');',
        '',
      ].join('\n'),
    );
  });

  it('should write the DDL even without documents', async () => {
    const writer = new SqlScriptWriter(['CREATE TABLE IF NOT EXISTS "T" ("a" TEXT);']);
    expect(await collect(writer, [])).toBe('CREATE TABLE IF NOT EXISTS "T" ("a" TEXT);\n');
  });

  it('should skip documents without statements', async () => {
    const writer = new SqlScriptWriter();
    expect(await collect(writer, [emission('1', [])])).toBe('');
  });
});

describe('SqlScriptFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'relationalizer-sql-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write the DDL and every emission to disk', async () => {
    const path = join(dir, 'out.sql');
    const script = await SqlScriptFile.open(path);
    script.start(['CREATE TABLE IF NOT EXISTS "T" ("Id" TEXT);']);
    for (let i = 0; i < 200; i++) {
      await script.write(emission(String(i), [`v${i}`]));
    }
    await script.close();

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines[0]).toBe('CREATE TABLE IF NOT EXISTS "T" ("Id" TEXT);');
    expect(lines[1]).toBe('-- document 0');
    expect(lines).toHaveLength(402);
    expect(lines[400]).toBe('INSERT OR IGNORE INTO "Listings" ("Id") VALUES (\'v199\');');
  });

  it('should fail to open a file in a missing directory', async () => {
    await expect(SqlScriptFile.open(join(dir, 'missing', 'out.sql'))).rejects.toThrow(FileIOError);
  });
});
