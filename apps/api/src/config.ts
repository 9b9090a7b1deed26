import path from 'path';

export const DEFAULT_SCHEMA = 'public';
// n8n's Supabase node stores this label when no table has been picked
export const TABLE_PLACEHOLDER = 'Supabase';
export const RPC_CALL_OPERATION = 'call';
export const RPC_PATH_PATTERN = /\/rpc\/([a-zA-Z_][a-zA-Z0-9_]*)/;

export const WORKFLOW_EXPORT_FILES = ['n8n_data.json', path.join('n8n_workflows_export', 'n8n_data.json')];
export const CATALOG_EXPORT_FILES = ['supabase_data.json', path.join('supabase_export_tables', 'supabase_data.json')];
export const REPORT_FILE = 'stack_data.json';

export type AppConfig = {
  dataDir: string;
  workflowPaths: string[];
  catalogPaths: string[];
  outputPath: string;
  port: number;
};

const nonEmpty = (value?: string) => (value && value.trim() ? value.trim() : undefined);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const dataDir = nonEmpty(env.DATA_DIR) || process.cwd();
  const workflowsPath = nonEmpty(env.WORKFLOWS_PATH);
  const catalogPath = nonEmpty(env.CATALOG_PATH);
  const port = Number(env.PORT || 8080);

  return {
    dataDir,
    workflowPaths: workflowsPath ? [workflowsPath] : WORKFLOW_EXPORT_FILES.map(file => path.join(dataDir, file)),
    catalogPaths: catalogPath ? [catalogPath] : CATALOG_EXPORT_FILES.map(file => path.join(dataDir, file)),
    outputPath: nonEmpty(env.OUTPUT_PATH) || path.join(dataDir, REPORT_FILE),
    port: Number.isFinite(port) ? port : 8080
  };
};
