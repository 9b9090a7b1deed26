import type { AppConfig } from './config';
import {
  CATALOG_ARTIFACT,
  parseCatalogExport,
  parseDependencyRows,
  parseFunctionRows,
  parseTableRows,
  parseWorkflowExport,
  readArtifact,
  WORKFLOW_ARTIFACT
} from './ingest/artifacts';
import { formatSummaryLines, formatUsageLines, writeJsonFile, writeReport } from './output';
import { reconcile } from './reconcile';
import { buildCatalog, type CatalogBuildResult } from './resolve/dependencies';
import type { ReconcileResult } from './types/stack';

export type MergeOptions = Pick<AppConfig, 'workflowPaths' | 'catalogPaths' | 'outputPath'> & {
  now?: Date;
};

export type MergeResult = ReconcileResult & {
  outputPath: string;
  workflowsPath: string | null;
  catalogPath: string | null;
};

export const runMerge = async ({ workflowPaths, catalogPaths, outputPath, now }: MergeOptions): Promise<MergeResult> => {
  // Parse both artifacts before anything is written so a malformed file aborts the run cleanly
  const workflowArtifact = await readArtifact(workflowPaths, WORKFLOW_ARTIFACT, { skipEmpty: true });
  const catalogArtifact = await readArtifact(catalogPaths, CATALOG_ARTIFACT, { skipEmpty: true });
  const workflows = workflowArtifact ? parseWorkflowExport(workflowArtifact.data) : null;
  const catalog = catalogArtifact ? parseCatalogExport(catalogArtifact.data) : null;

  const result = reconcile({ workflows, catalog, now });
  result.warnings.forEach(warning => console.warn(`WARNING: ${warning}`));
  formatUsageLines(result.usage).forEach(line => console.log(line));

  await writeReport(result.report, outputPath);
  formatSummaryLines(result.report, outputPath).forEach(line => console.log(line));

  return {
    ...result,
    outputPath,
    workflowsPath: workflowArtifact?.path ?? null,
    catalogPath: catalogArtifact?.path ?? null
  };
};

export type CatalogBuildOptions = {
  tablesPath: string;
  functionsPath?: string;
  dependenciesPath?: string;
  outputPath: string;
  now?: Date;
};

export const runCatalogBuild = async ({
  tablesPath,
  functionsPath,
  dependenciesPath,
  outputPath,
  now
}: CatalogBuildOptions): Promise<CatalogBuildResult & { outputPath: string }> => {
  const tablesArtifact = await readArtifact([tablesPath], 'table listing');
  if (!tablesArtifact) {
    throw new Error(`Table listing not found at ${tablesPath}. Export list_tables first.`);
  }
  const functionsArtifact = functionsPath ? await readArtifact([functionsPath], 'function listing') : null;
  const dependenciesArtifact = dependenciesPath ? await readArtifact([dependenciesPath], 'dependency listing') : null;

  const tables = parseTableRows(tablesArtifact.data, 'table listing');
  const functions = functionsArtifact ? parseFunctionRows(functionsArtifact.data, 'function listing') : [];
  const dependencies = dependenciesArtifact ? parseDependencyRows(dependenciesArtifact.data, 'dependency listing') : [];

  const result = buildCatalog(tables, functions, dependencies, now);
  console.log(`Found ${tables.length} tables and ${functions.length} functions`);
  if (dependencies.length) console.log(`Found ${dependencies.length} function dependencies`);
  result.warnings.forEach(warning => console.warn(`WARNING: ${warning}`));

  await writeJsonFile(outputPath, JSON.stringify(result.catalog, null, 2));
  console.log(`Catalog bundle saved to: ${outputPath}`);
  return { ...result, outputPath };
};
