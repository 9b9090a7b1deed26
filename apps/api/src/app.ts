import express from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import path from 'path';

import { loadConfig, type AppConfig } from './config';
import { MalformedInputError } from './errors';
import {
  CATALOG_ARTIFACT,
  parseArtifactText,
  parseCatalogExport,
  parseDependencyRows,
  parseFunctionRows,
  parseStoredReport,
  parseTableRows,
  parseWorkflowExport,
  REPORT_ARTIFACT,
  WORKFLOW_ARTIFACT
} from './ingest/artifacts';
import { buildReportWorkbook } from './output';
import { reconcile } from './reconcile';
import { buildCatalog } from './resolve/dependencies';
import { isRecord } from './utils/values';

const errorMessage = (err: unknown, fallback: string) => (err instanceof Error && err.message) || fallback;
const errorStatus = (err: unknown) => (err instanceof MalformedInputError ? 400 : 500);

const reconcileInputs = (workflowsData: unknown, catalogData: unknown) => {
  const workflows = workflowsData === undefined ? null : parseWorkflowExport(workflowsData);
  const catalog = catalogData === undefined ? null : parseCatalogExport(catalogData);
  const result = reconcile({ workflows, catalog });
  result.warnings.forEach(warning => console.warn(`WARNING: ${warning}`));
  return { ...result.report, warnings: result.warnings };
};

const uploadedText = (file?: Express.Multer.File) => (file ? file.buffer.toString('utf-8') : undefined);

export const createApp = (config: AppConfig = loadConfig()) => {
  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: '20mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/reconcile', (req, res) => {
    try {
      const body: unknown = req.body;
      const payload = isRecord(body) ? body : {};
      res.json(reconcileInputs(payload.workflows, payload.catalog));
    } catch (err) {
      res.status(errorStatus(err)).json({ error: errorMessage(err, 'Reconciliation failed') });
    }
  });

  app.post(
    '/api/reconcile/upload',
    upload.fields([
      { name: 'workflows', maxCount: 1 },
      { name: 'catalog', maxCount: 1 }
    ]),
    (req, res) => {
      try {
        const files: Record<string, Express.Multer.File[]> = req.files && !Array.isArray(req.files) ? req.files : {};
        const workflowsText = uploadedText(files.workflows?.[0]);
        const catalogText = uploadedText(files.catalog?.[0]);
        if (workflowsText === undefined && catalogText === undefined) {
          return res.status(400).json({ error: 'Upload a workflows and/or catalog JSON file.' });
        }

        const workflowsData = workflowsText === undefined ? undefined : parseArtifactText(workflowsText, WORKFLOW_ARTIFACT);
        const catalogData = catalogText === undefined ? undefined : parseArtifactText(catalogText, CATALOG_ARTIFACT);
        res.json(reconcileInputs(workflowsData, catalogData));
      } catch (err) {
        res.status(errorStatus(err)).json({ error: errorMessage(err, 'Reconciliation upload failed') });
      }
    }
  );

  app.post('/api/catalog/build', (req, res) => {
    try {
      const body: unknown = req.body;
      const payload = isRecord(body) ? body : {};
      if (!Array.isArray(payload.tables) || !Array.isArray(payload.functions)) {
        return res.status(400).json({ error: 'tables and functions arrays are required' });
      }

      const tables = parseTableRows(payload.tables, 'table listing');
      const functions = parseFunctionRows(payload.functions, 'function listing');
      const dependencies = parseDependencyRows(payload.dependencies, 'dependency listing');
      const { catalog, warnings } = buildCatalog(tables, functions, dependencies);
      res.json({ ...catalog, warnings });
    } catch (err) {
      res.status(errorStatus(err)).json({ error: errorMessage(err, 'Catalog build failed') });
    }
  });

  app.get('/api/report', async (req, res) => {
    try {
      const format = String(req.query.format || 'json').toLowerCase();
      const text = await fs.readFile(config.outputPath, 'utf-8');
      const data = parseArtifactText(text, REPORT_ARTIFACT);

      if (format === 'xlsx') {
        const buffer = buildReportWorkbook(parseStoredReport(data));
        const filename = `${path.basename(config.outputPath, '.json')}.xlsx`;
        res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        res.send(buffer);
        return;
      }

      res.json(data);
    } catch (err) {
      if (isRecord(err) && err.code === 'ENOENT') {
        return res.status(404).json({ error: 'No report generated yet. Run the merge first.' });
      }
      res.status(errorStatus(err)).json({ error: errorMessage(err, 'Failed to read report') });
    }
  });

  return app;
};
