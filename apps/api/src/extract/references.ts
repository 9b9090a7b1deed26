import { RPC_CALL_OPERATION, RPC_PATH_PATTERN, TABLE_PLACEHOLDER } from '../config';
import type { UsageSets, WorkflowGraph, WorkflowNode } from '../types/stack';
import { isRecord } from '../utils/values';
import { resolveParameter } from './locator';

export const workflowNodes = (workflow: WorkflowGraph): WorkflowNode[] => {
  const nodes = Array.isArray(workflow.nodes) ? workflow.nodes : [];
  return nodes.filter(isRecord).map(node => ({
    type: typeof node.type === 'string' ? node.type : '',
    parameters: isRecord(node.parameters) ? node.parameters : {}
  }));
};

export const findRpcInUrl = (url: string): string | null => {
  const match = RPC_PATH_PATTERN.exec(url);
  return match ? match[1] : null;
};

const scanSupabaseNode = (params: Record<string, unknown>, usage: UsageSets) => {
  const tableName = resolveParameter(params.tableName);
  if (tableName && tableName !== TABLE_PLACEHOLDER) {
    usage.tablesUsed.add(tableName);
  }

  if (resolveParameter(params.operation) === RPC_CALL_OPERATION) {
    const functionName = resolveParameter(params.functionName || params.rpc);
    if (functionName) usage.functionsUsed.add(functionName);
  }
};

const scanHttpNode = (params: Record<string, unknown>, usage: UsageSets) => {
  const url = resolveParameter(params.url ?? '');
  const rpc = findRpcInUrl(url);
  if (rpc) usage.functionsUsed.add(rpc);
};

export const extractReferences = (workflows: WorkflowGraph[]): UsageSets => {
  const usage: UsageSets = { tablesUsed: new Set(), functionsUsed: new Set() };

  for (const workflow of workflows) {
    for (const node of workflowNodes(workflow)) {
      const nodeType = node.type.toLowerCase();

      if (nodeType.includes('supabase')) scanSupabaseNode(node.parameters, usage);
      if (nodeType.includes('httprequest') || nodeType.includes('http')) scanHttpNode(node.parameters, usage);
    }
  }

  return usage;
};
