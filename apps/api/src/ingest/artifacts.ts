import fs from 'fs/promises';
import { DEFAULT_SCHEMA } from '../config';
import { MalformedInputError } from '../errors';
import type {
  Catalog,
  CatalogFunction,
  CatalogTable,
  DependencyRecord,
  RawFunctionRow,
  RawTableRow,
  StackReport,
  WorkflowGraph
} from '../types/stack';
import { isEmptyContent, isRecord, optionalString } from '../utils/values';

export const WORKFLOW_ARTIFACT = 'workflow export';
export const CATALOG_ARTIFACT = 'catalog export';
export const REPORT_ARTIFACT = 'stack report';

export type LoadedArtifact = {
  path: string;
  data: unknown;
};

export const parseArtifactText = (text: string, label: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(label, `invalid JSON (${reason})`);
  }
};

const fileExists = async (filePath: string) => {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') return false;
    throw err;
  }
};

// With skipEmpty, a candidate holding only {} or [] is passed over for the next one
export const readArtifact = async (
  candidates: string[],
  label: string,
  { skipEmpty = false }: { skipEmpty?: boolean } = {}
): Promise<LoadedArtifact | null> => {
  for (const candidate of candidates) {
    if (!(await fileExists(candidate))) continue;
    const text = await fs.readFile(candidate, 'utf-8');
    const data = parseArtifactText(text, label);
    if (skipEmpty && isEmptyContent(data)) continue;
    return { path: candidate, data };
  }
  return null;
};

const recordList = (value: unknown, label: string, field: string): Record<string, unknown>[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new MalformedInputError(label, `"${field}" must be an array`);
  return value.map((entry, index) => {
    if (!isRecord(entry)) throw new MalformedInputError(label, `${field}[${index}] must be an object`);
    return entry;
  });
};

// null means the artifact holds no workflows at all and is treated like a missing file
export const parseWorkflowExport = (data: unknown, label = WORKFLOW_ARTIFACT): WorkflowGraph[] | null => {
  if (isEmptyContent(data)) return null;
  if (Array.isArray(data)) return recordList(data, label, 'workflows');
  if (isRecord(data)) return recordList(data.workflows, label, 'workflows');
  throw new MalformedInputError(label, 'expected an object with "workflows" or an array of workflows');
};

// Field values are kept as given; only absent fields take a default
const withDefault = (value: unknown, fallback: unknown) => (value === undefined ? fallback : value);

const parseCatalogEntries = (data: Record<string, unknown>, label: string) => {
  const tables: CatalogTable[] = recordList(data.tables, label, 'tables').map(table => ({
    schema: withDefault(table.schema, DEFAULT_SCHEMA),
    name: withDefault(table.name, null)
  }));

  const functions: CatalogFunction[] = recordList(data.functions, label, 'functions').map(fn => ({
    schema: withDefault(fn.schema, DEFAULT_SCHEMA),
    name: withDefault(fn.name, null),
    tables_used: withDefault(fn.tables_used, [])
  }));

  return { tables, functions };
};

export const parseCatalogExport = (data: unknown, label = CATALOG_ARTIFACT): Catalog | null => {
  if (isEmptyContent(data)) return null;
  if (!isRecord(data)) throw new MalformedInputError(label, 'expected an object with "tables" and "functions"');

  return {
    metadata: isRecord(data.metadata) ? data.metadata : {},
    ...parseCatalogEntries(data, label)
  };
};

const numberField = (value: unknown) => (typeof value === 'number' ? value : 0);
const usedFlags = (entries: unknown) => (Array.isArray(entries) ? entries.map(entry => isRecord(entry) && entry.used_by_n8n === true) : []);

// Reads back a report written by writeReport
export const parseStoredReport = (data: unknown, label = REPORT_ARTIFACT): StackReport => {
  const metadata = isRecord(data) ? data.metadata : undefined;
  const supabase = isRecord(data) ? data.supabase : undefined;
  if (!isRecord(data) || !isRecord(metadata) || !isRecord(supabase)) {
    throw new MalformedInputError(label, 'expected "metadata" and "supabase" sections');
  }

  const { tables, functions } = parseCatalogEntries(supabase, label);
  const tableFlags = usedFlags(supabase.tables);
  const functionFlags = usedFlags(supabase.functions);

  return {
    metadata: {
      generated_at: optionalString(metadata.generated_at) ?? '',
      workflow_count: numberField(metadata.workflow_count),
      table_count: numberField(metadata.table_count),
      function_count: numberField(metadata.function_count),
      tables_used_by_n8n: numberField(metadata.tables_used_by_n8n),
      functions_used_by_n8n: numberField(metadata.functions_used_by_n8n)
    },
    workflows: recordList(data.workflows, label, 'workflows'),
    supabase: {
      tables: tables.map((table, index) => ({
        name: table.name,
        schema: table.schema,
        used_by_n8n: tableFlags[index] ?? false
      })),
      functions: functions.map((fn, index) => ({
        name: fn.name,
        schema: fn.schema,
        tables_used: fn.tables_used,
        used_by_n8n: functionFlags[index] ?? false
      }))
    }
  };
};

export const parseTableRows = (data: unknown, label: string): RawTableRow[] =>
  recordList(data, label, 'tables').map(row => ({
    schema_name: optionalString(row.schema_name),
    table_name: optionalString(row.table_name)
  }));

export const parseFunctionRows = (data: unknown, label: string): RawFunctionRow[] =>
  recordList(data, label, 'functions').map(row => ({
    schema_name: optionalString(row.schema_name),
    function_schema: optionalString(row.function_schema),
    function_name: optionalString(row.function_name),
    name: optionalString(row.name)
  }));

export const parseDependencyRows = (data: unknown, label: string): DependencyRecord[] =>
  recordList(data, label, 'dependencies').map(row => ({
    function_name: optionalString(row.function_name),
    function_schema: optionalString(row.function_schema),
    referenced_table: optionalString(row.referenced_table),
    referenced_schema: optionalString(row.referenced_schema)
  }));
