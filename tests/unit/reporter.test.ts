import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  RunReporter,
  TOOL_NAME,
  buildSchemaReport,
  writeJsonArtifact,
} from '../../src/lib/reporter/index.js';
import { discoverSchema, fromDocuments } from '../../src/lib/pipeline/index.js';
import { DEFAULT_CONFIG } from '../../src/types/config.js';
import { FileIOError } from '../../src/utils/errors.js';
import { RAW_LISTINGS } from '../helpers/fixtures.js';

describe('Reporter', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'relationalizer-report-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('buildSchemaReport', () => {
    it('should describe tables and their columns', async () => {
      const discovery = await discoverSchema([fromDocuments(RAW_LISTINGS)], DEFAULT_CONFIG);
      const report = buildSchemaReport(discovery);

      expect(report.documentsAnalyzed).toBe(2);
      expect(report.rootTable).toBe('Listings');
      expect(report.linkMode).toBe('embedded');
      expect(report.tables.map((t) => t.name)).toEqual(['Listings', 'Phones']);
      expect(report.tables[0]?.columns).toEqual([
        { name: 'Id', path: 'Id', sqlType: 'TEXT', nullable: false, primaryKey: true, kind: 'value' },
        {
          name: 'Phones',
          path: 'Phones',
          sqlType: 'TEXT',
          nullable: false,
          primaryKey: false,
          kind: 'reference',
          references: 'Phones',
        },
      ]);
      expect(report.conflicts).toEqual([]);
      expect(report.failures).toEqual([]);
    });
  });

  describe('writeJsonArtifact', () => {
    it('should create missing directories', async () => {
      const file = join(dir, 'nested', 'report.json');
      await writeJsonArtifact(file, { ok: true });
      expect(readFileSync(file, 'utf-8')).toBe('{\n  "ok": true\n}\n');
    });

    it('should raise FileIOError when the file cannot be written', async () => {
      const blocker = join(dir, 'blocker');
      writeFileSync(blocker, 'file');
      await expect(writeJsonArtifact(join(blocker, 'report.json'), {})).rejects.toThrow(FileIOError);
    });
  });

  describe('RunReporter', () => {
    it('should hash files with SHA-256', async () => {
      const file = join(dir, 'hello.txt');
      writeFileSync(file, 'hello');
      const reporter = new RunReporter('conversion', DEFAULT_CONFIG, []);
      expect(await reporter.calculateFileHash(file)).toBe(
        '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
      );
    });

    it('should save a manifest beside the output', async () => {
      const output = join(dir, 'out.db');
      writeFileSync(output, 'hello');

      const reporter = new RunReporter('conversion', DEFAULT_CONFIG, ['raw.db']);
      await reporter.addArtifact('output', output);
      reporter.setSummary({ documentsWritten: 2 });
      const manifestPath = await reporter.save(output);

      expect(manifestPath).toBe(`${output}.manifest.json`);
      const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
      expect(manifest).toMatchObject({
        tool: { name: TOOL_NAME },
        run: { phase: 'conversion' },
        config: { rootTableName: 'Listings', linkMode: 'embedded', minimal: null },
        sources: ['raw.db'],
        artifacts: {
          output: {
            path: output,
            hash: '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
            size: 5,
          },
        },
        summary: { documentsWritten: 2 },
      });
    });

    it('should hand out copies that do not alter the manifest', async () => {
      const output = join(dir, 'copy.db');
      writeFileSync(output, 'hello');

      const reporter = new RunReporter('conversion', DEFAULT_CONFIG, ['raw.db']);
      await reporter.addArtifact('output', output);
      reporter.setSummary({ tables: { Listings: 2 } });

      const copy = reporter.getManifest();
      copy.sources.push('other.db');
      copy.run.phase = 'analysis';
      delete copy.artifacts.output;
      copy.summary.tables = {};

      const manifest = reporter.getManifest();
      expect(manifest.sources).toEqual(['raw.db']);
      expect(manifest.run.phase).toBe('conversion');
      expect(manifest.artifacts.output?.size).toBe(5);
      expect(manifest.summary).toEqual({ tables: { Listings: 2 } });
    });
  });
});
