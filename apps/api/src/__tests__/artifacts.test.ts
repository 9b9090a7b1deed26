import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { MalformedInputError } from '../errors';
import {
  parseArtifactText,
  parseCatalogExport,
  parseDependencyRows,
  parseStoredReport,
  parseWorkflowExport,
  readArtifact
} from '../ingest/artifacts';

describe('parseArtifactText', () => {
  it('parses JSON', () => {
    expect(parseArtifactText('{"workflows":[]}', 'workflow export')).toEqual({ workflows: [] });
  });

  it('raises MalformedInputError for invalid JSON', () => {
    expect(() => parseArtifactText('{"workflows": [', 'workflow export')).toThrow(MalformedInputError);
    expect(() => parseArtifactText('nope', 'catalog export')).toThrow(/^catalog export: invalid JSON/);
  });
});

describe('parseWorkflowExport', () => {
  it('accepts an object with a workflows key', () => {
    const workflows = [{ id: '1', name: 'A', nodes: [] }];
    expect(parseWorkflowExport({ workflows, count: 1 })).toEqual(workflows);
  });

  it('accepts a bare array of workflows', () => {
    expect(parseWorkflowExport([{ id: '1', nodes: [] }, { id: '2' }])).toEqual([{ id: '1', nodes: [] }, { id: '2' }]);
  });

  it('defaults to no workflows when the key is missing', () => {
    expect(parseWorkflowExport({ exportedAt: '2026-01-01' })).toEqual([]);
  });

  it('treats empty content as missing', () => {
    expect(parseWorkflowExport({})).toBeNull();
    expect(parseWorkflowExport([])).toBeNull();
    expect(parseWorkflowExport(null)).toBeNull();
  });

  it('rejects structures it cannot read', () => {
    expect(() => parseWorkflowExport('workflows')).toThrow(MalformedInputError);
    expect(() => parseWorkflowExport({ workflows: 'none' })).toThrow('workflow export: "workflows" must be an array');
    expect(() => parseWorkflowExport([{ id: '1' }, 3])).toThrow('workflow export: workflows[1] must be an object');
  });
});

describe('parseCatalogExport', () => {
  it('defaults absent schemas and keeps nameless tables', () => {
    const catalog = parseCatalogExport({
      metadata: { table_count: 2 },
      tables: [{ schema: 'public', name: 'orders' }, {}],
      functions: [{ name: 'refresh_orders', tables_used: ['orders'] }, { schema: 'ops', name: 'archive' }]
    });

    expect(catalog).toEqual({
      metadata: { table_count: 2 },
      tables: [
        { schema: 'public', name: 'orders' },
        { schema: 'public', name: null }
      ],
      functions: [
        { schema: 'public', name: 'refresh_orders', tables_used: ['orders'] },
        { schema: 'ops', name: 'archive', tables_used: [] }
      ]
    });
  });

  it('defaults missing collections to empty lists', () => {
    expect(parseCatalogExport({ metadata: {} })).toEqual({ metadata: {}, tables: [], functions: [] });
  });

  it('treats empty content as missing', () => {
    expect(parseCatalogExport({})).toBeNull();
  });

  it('passes field values through as given', () => {
    const catalog = parseCatalogExport({
      tables: [{ schema: null, name: 42 }],
      functions: [
        { name: 'f', tables_used: [{ schema: 'public', table: 'orders' }] },
        { name: 'g', tables_used: null }
      ]
    });

    expect(catalog?.tables).toEqual([{ schema: null, name: 42 }]);
    expect(catalog?.functions).toEqual([
      { schema: 'public', name: 'f', tables_used: [{ schema: 'public', table: 'orders' }] },
      { schema: 'public', name: 'g', tables_used: null }
    ]);
  });

  it('rejects catalogs whose collections are not lists of objects', () => {
    expect(() => parseCatalogExport([{ name: 'orders' }])).toThrow(MalformedInputError);
    expect(() => parseCatalogExport({ tables: { orders: {} } })).toThrow('catalog export: "tables" must be an array');
    expect(() => parseCatalogExport({ functions: ['refresh_orders'] })).toThrow('catalog export: functions[0] must be an object');
  });
});

describe('parseDependencyRows', () => {
  it('keeps string fields and drops everything else', () => {
    expect(parseDependencyRows([{ function_name: 'f', referenced_table: 't', extra: 1, function_schema: 5 }], 'deps')).toEqual([
      { function_name: 'f', function_schema: undefined, referenced_table: 't', referenced_schema: undefined }
    ]);
  });
});

describe('parseStoredReport', () => {
  it('reads a written report back', () => {
    const report = parseStoredReport({
      metadata: { generated_at: '2026-03-01T12:00:00.000Z', workflow_count: 1, table_count: 1, function_count: 0 },
      workflows: [{ id: 'wf-1' }],
      supabase: { tables: [{ name: 'orders', schema: 'public', used_by_n8n: true }], functions: [] }
    });

    expect(report.metadata).toEqual({
      generated_at: '2026-03-01T12:00:00.000Z',
      workflow_count: 1,
      table_count: 1,
      function_count: 0,
      tables_used_by_n8n: 0,
      functions_used_by_n8n: 0
    });
    expect(report.supabase.tables).toEqual([{ name: 'orders', schema: 'public', used_by_n8n: true }]);
    expect(report.workflows).toEqual([{ id: 'wf-1' }]);
  });

  it('rejects files without the report sections', () => {
    expect(() => parseStoredReport({ tables: [] })).toThrow('stack report: expected "metadata" and "supabase" sections');
  });
});

describe('readArtifact', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stack-usage-artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null when no candidate exists', async () => {
    expect(await readArtifact([path.join(dir, 'missing.json')], 'workflow export')).toBeNull();
  });

  it('uses the first candidate that exists', async () => {
    const nested = path.join(dir, 'export', 'n8n_data.json');
    await fs.mkdir(path.dirname(nested), { recursive: true });
    await fs.writeFile(nested, JSON.stringify({ workflows: [{ id: 'nested' }] }));

    const artifact = await readArtifact([path.join(dir, 'n8n_data.json'), nested], 'workflow export');
    expect(artifact).toEqual({ path: nested, data: { workflows: [{ id: 'nested' }] } });
  });

  it('stops at the first existing candidate even when it is empty', async () => {
    const root = path.join(dir, 'n8n_data.json');
    await fs.writeFile(root, '[]');

    expect(await readArtifact([root], 'workflow export')).toEqual({ path: root, data: [] });
  });

  it('skips empty candidates when asked to', async () => {
    const root = path.join(dir, 'n8n_data.json');
    const nested = path.join(dir, 'export', 'n8n_data.json');
    await fs.mkdir(path.dirname(nested), { recursive: true });
    await fs.writeFile(root, '{}');
    await fs.writeFile(nested, JSON.stringify([{ id: 'nested' }]));

    expect(await readArtifact([root, nested], 'workflow export', { skipEmpty: true })).toEqual({
      path: nested,
      data: [{ id: 'nested' }]
    });
    expect(await readArtifact([root], 'workflow export', { skipEmpty: true })).toBeNull();
  });

  it('fails on unparseable files', async () => {
    const file = path.join(dir, 'supabase_data.json');
    await fs.writeFile(file, '{ not json');
    await expect(readArtifact([file], 'catalog export')).rejects.toBeInstanceOf(MalformedInputError);
  });
});
