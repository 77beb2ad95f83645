import {
  type ContractStatusResponse,
  type ContractStatusResult,
  type ContractStatusWireResult,
  type ProviderFailure,
  toWireResponse,
} from '@spamcheck/core';

import type { CheckResult } from './check-handler.js';

export type VerdictLabel = 'legitimate' | 'spam' | 'undetermined';

export interface CheckSummary {
  legitimate: number;
  spam: number;
  total: number;
  undetermined: number;
}

/**
 * `--json` payload: results in the service's wire shape, provider failures kept
 * apart and listed only for addresses that had any.
 */
export interface CheckJsonPayload {
  chainId: number;
  chainName: string;
  diagnostics: Record<string, ProviderFailure[]>;
  results: Record<string, ContractStatusWireResult>;
  summary: CheckSummary;
}

export function verdictLabel(status: boolean | null): VerdictLabel {
  if (status === null) {
    return 'undetermined';
  }
  return status ? 'spam' : 'legitimate';
}

export function summarizeResults(response: ContractStatusResponse): CheckSummary {
  const summary: CheckSummary = { legitimate: 0, spam: 0, total: 0, undetermined: 0 };
  for (const result of Object.values(response)) {
    summary[verdictLabel(result.contractSpamStatus)] += 1;
    summary.total += 1;
  }
  return summary;
}

/**
 * `0xabc...  spam          AI analysis classified as spam [moralis]`
 */
export function formatResultLine(address: string, result: ContractStatusResult): string {
  const source = result.source ? ` [${result.source}]` : '';
  return `${address}  ${verdictLabel(result.contractSpamStatus).padEnd(12)}  ${result.message}${source}`;
}

/**
 * One indented line per provider failure.
 */
export function formatDiagnostics(result: ContractStatusResult): string[] {
  return result.diagnostics.map((failure) => `    ${failure.provider} (${failure.kind}): ${failure.message}`);
}

export function formatSummary(summary: CheckSummary): string {
  return `${summary.total} checked: ${summary.spam} spam, ${summary.legitimate} legitimate, ${summary.undetermined} undetermined`;
}

export function buildCheckJson(result: CheckResult): CheckJsonPayload {
  const diagnostics: Record<string, ProviderFailure[]> = {};
  for (const [address, status] of Object.entries(result.results)) {
    if (status.diagnostics.length > 0) {
      diagnostics[address] = status.diagnostics;
    }
  }
  return {
    chainId: result.chainId,
    chainName: result.chainName,
    diagnostics,
    results: toWireResponse(result.results),
    summary: result.summary,
  };
}
