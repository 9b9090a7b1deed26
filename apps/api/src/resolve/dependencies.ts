import { DEFAULT_SCHEMA } from '../config';
import type { Catalog, CatalogFunction, CatalogTable, DependencyRecord, RawFunctionRow, RawTableRow } from '../types/stack';

export type DependencyMap = Map<string, string[]>;

export type CatalogBuildResult = {
  catalog: Catalog;
  warnings: string[];
};

export const dependencyKey = (schema: string, functionName: string) => JSON.stringify([schema, functionName]);

export const resolveDependencies = (records: DependencyRecord[]): DependencyMap => {
  const grouped = new Map<string, Set<string>>();

  for (const record of records) {
    if (!record.function_name || !record.referenced_table) continue;
    const key = dependencyKey(record.function_schema ?? DEFAULT_SCHEMA, record.function_name);
    if (!grouped.has(key)) grouped.set(key, new Set());
    grouped.get(key)?.add(record.referenced_table);
  }

  return new Map(Array.from(grouped.entries()).map(([key, tables]) => [key, Array.from(tables).sort()]));
};

export const tablesForFunction = (deps: DependencyMap, schema: string, functionName: string | null): string[] => {
  if (!functionName) return [];
  return [...(deps.get(dependencyKey(schema, functionName)) ?? [])];
};

export const buildFunctionsWithDependencies = (
  functions: RawFunctionRow[],
  dependencies: DependencyRecord[]
): CatalogFunction[] => {
  const deps = resolveDependencies(dependencies);
  return functions.map(fn => {
    const schema = fn.schema_name || fn.function_schema || DEFAULT_SCHEMA;
    const name = fn.function_name || fn.name || null;
    return { schema, name, tables_used: tablesForFunction(deps, schema, name) };
  });
};

export const buildCatalog = (
  tables: RawTableRow[],
  functions: RawFunctionRow[],
  dependencies: DependencyRecord[],
  now: Date = new Date()
): CatalogBuildResult => {
  const warnings: string[] = [];
  if (!dependencies.length) {
    warnings.push('No function dependencies available; functions are exported without tables_used.');
  }

  const catalogTables: CatalogTable[] = tables
    .filter(table => table.table_name)
    .map(table => ({ schema: table.schema_name ?? DEFAULT_SCHEMA, name: table.table_name ?? null }));
  const catalogFunctions = buildFunctionsWithDependencies(functions, dependencies);

  return {
    catalog: {
      metadata: {
        generated_at: now.toISOString(),
        table_count: catalogTables.length,
        function_count: catalogFunctions.length
      },
      tables: catalogTables,
      functions: catalogFunctions
    },
    warnings
  };
};
