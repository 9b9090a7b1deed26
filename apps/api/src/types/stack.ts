export type WorkflowGraph = Record<string, unknown>;

export type WorkflowNode = {
  type: string;
  parameters: Record<string, unknown>;
};

export type UsageSets = {
  tablesUsed: Set<string>;
  functionsUsed: Set<string>;
};

export type CatalogTable = {
  schema: unknown;
  name: unknown;
};

export type CatalogFunction = {
  schema: unknown;
  name: unknown;
  tables_used: unknown;
};

export type Catalog = {
  metadata: Record<string, unknown>;
  tables: CatalogTable[];
  functions: CatalogFunction[];
};

// One row of list_function_dependencies
export type DependencyRecord = {
  function_name?: string | null;
  function_schema?: string | null;
  referenced_table?: string | null;
  referenced_schema?: string | null;
};

export type RawTableRow = {
  schema_name?: string | null;
  table_name?: string | null;
};

export type RawFunctionRow = {
  schema_name?: string | null;
  function_schema?: string | null;
  function_name?: string | null;
  name?: string | null;
};

export type ReportTable = {
  name: unknown;
  schema: unknown;
  used_by_n8n: boolean;
};

export type ReportFunction = {
  name: unknown;
  schema: unknown;
  tables_used: unknown;
  used_by_n8n: boolean;
};

export type ReportMetadata = {
  generated_at: string;
  workflow_count: number;
  table_count: number;
  function_count: number;
  tables_used_by_n8n: number;
  functions_used_by_n8n: number;
};

export type StackReport = {
  metadata: ReportMetadata;
  workflows: WorkflowGraph[];
  supabase: {
    tables: ReportTable[];
    functions: ReportFunction[];
  };
};

export type ReconcileResult = {
  report: StackReport;
  usage: UsageSets;
  warnings: string[];
};
