import { z } from 'zod';
import type { Decision } from '../types/index.js';
import { errorMessage } from '../utils/index.js';

export const engineInputSchema = {
  filePath: z.string().describe('Path to the password-manager CSV export'),
  filter: z.string().optional()
    .describe('Comma-separated keywords; logins whose name, URI or username contain one are dropped'),
  defaultFolder: z.string().min(1).optional()
    .describe('Folder assigned to logins with an empty folder'),
};

/** Group decision without secrets, for tool output. */
export function summarizeDecision(decision: Decision) {
  const { key, records } = decision.group;
  return {
    name: key.name,
    domain: key.domain,
    username: key.username,
    hasTotp: key.hasTotp,
    hasNotes: key.hasNotes,
    size: records.length,
    keptIndex: records.indexOf(decision.kept),
    rule: decision.rule,
  };
}

export function jsonResult(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorResult(err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}
