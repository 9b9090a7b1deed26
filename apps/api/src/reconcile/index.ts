import { extractReferences } from '../extract/references';
import type { Catalog, ReconcileResult, ReportFunction, ReportTable, WorkflowGraph } from '../types/stack';

export const MISSING_WORKFLOWS_WARNING = 'Workflow export not found; the report covers catalog data only.';
export const MISSING_CATALOG_WARNING = 'Catalog export not found; the report has no tables or functions.';

export type ReconcileInput = {
  workflows: WorkflowGraph[] | null;
  catalog: Catalog | null;
  now?: Date;
};

const emptyCatalog = (): Catalog => ({ metadata: {}, tables: [], functions: [] });

export const reconcile = ({ workflows, catalog, now = new Date() }: ReconcileInput): ReconcileResult => {
  const warnings: string[] = [];
  if (!workflows) warnings.push(MISSING_WORKFLOWS_WARNING);
  if (!catalog) warnings.push(MISSING_CATALOG_WARNING);

  const graphs = workflows ?? [];
  const source = catalog ?? emptyCatalog();
  const usage = extractReferences(graphs);

  // Usage is matched on the bare name; public.foo and other.foo share one entry.
  const tables: ReportTable[] = source.tables.map(table => ({
    name: table.name,
    schema: table.schema,
    used_by_n8n: typeof table.name === 'string' && usage.tablesUsed.has(table.name)
  }));

  const functions: ReportFunction[] = source.functions.map(fn => ({
    name: fn.name,
    schema: fn.schema,
    tables_used: fn.tables_used,
    used_by_n8n: typeof fn.name === 'string' && usage.functionsUsed.has(fn.name)
  }));

  return {
    report: {
      metadata: {
        generated_at: now.toISOString(),
        workflow_count: graphs.length,
        table_count: tables.length,
        function_count: functions.length,
        tables_used_by_n8n: usage.tablesUsed.size,
        functions_used_by_n8n: usage.functionsUsed.size
      },
      workflows: graphs,
      supabase: { tables, functions }
    },
    usage,
    warnings
  };
};
