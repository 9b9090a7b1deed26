import * as XLSX from 'xlsx';
import fs from 'fs/promises';
import path from 'path';
import type { StackReport, UsageSets } from './types/stack';

export const serializeReport = (report: StackReport) => JSON.stringify(report, null, 2);

export const writeJsonFile = async (filePath: string, payload: string) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, payload, 'utf-8');
};

export const writeReport = async (report: StackReport, outputPath: string) => {
  await writeJsonFile(outputPath, serializeReport(report));
};

const cellText = (value: unknown): string => {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
};

const tablesUsedText = (value: unknown) => (Array.isArray(value) ? value.map(cellText).join(', ') : cellText(value));

const sortedNames = (names: Set<string>) => Array.from(names).sort();

export const formatUsageLines = (usage: UsageSets) => [
  `n8n uses ${usage.tablesUsed.size} tables: ${JSON.stringify(sortedNames(usage.tablesUsed))}`,
  `n8n uses ${usage.functionsUsed.size} functions: ${JSON.stringify(sortedNames(usage.functionsUsed))}`
];

export const formatSummaryLines = (report: StackReport, outputPath: string) => {
  const { metadata } = report;
  return [
    `Generated: ${outputPath}`,
    `  - ${metadata.workflow_count} workflows`,
    `  - ${metadata.table_count} tables (${metadata.tables_used_by_n8n} used by n8n)`,
    `  - ${metadata.function_count} functions (${metadata.functions_used_by_n8n} used by n8n)`
  ];
};

export const buildReportWorkbook = (report: StackReport) => {
  const workbook = XLSX.utils.book_new();

  const summary = XLSX.utils.aoa_to_sheet([
    ['key', 'value'],
    ...Object.entries(report.metadata).map(([key, value]) => [key, value])
  ]);
  XLSX.utils.book_append_sheet(workbook, summary, 'Summary');

  const tables = XLSX.utils.json_to_sheet(
    report.supabase.tables.map(table => ({
      name: cellText(table.name),
      schema: cellText(table.schema),
      used_by_n8n: table.used_by_n8n
    })),
    { header: ['name', 'schema', 'used_by_n8n'] }
  );
  XLSX.utils.book_append_sheet(workbook, tables, 'Tables');

  const functions = XLSX.utils.json_to_sheet(
    report.supabase.functions.map(fn => ({
      name: cellText(fn.name),
      schema: cellText(fn.schema),
      tables_used: tablesUsedText(fn.tables_used),
      used_by_n8n: fn.used_by_n8n
    })),
    { header: ['name', 'schema', 'tables_used', 'used_by_n8n'] }
  );
  XLSX.utils.book_append_sheet(workbook, functions, 'Functions');

  const buffer: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
  return buffer;
};
