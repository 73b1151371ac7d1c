import chalk from 'chalk';
import type { AgentDefinition, AnalysisRecord } from '@factsieve/core';
import type { StoredAnalysisSummary } from '../store.js';

function statusLabel(status: AnalysisRecord['status']): string {
  if (status === 'completed') return chalk.green(status);
  if (status === 'failed') return chalk.red(status);
  return chalk.yellow(status);
}

/** Closing lines printed after `analyze`. */
export function formatSummary(record: AnalysisRecord, savedPath?: string): string[] {
  const lines: string[] = [];
  if (record.status === 'completed') {
    lines.push(chalk.green.bold('✓ Analysis complete'));
  } else {
    lines.push(chalk.red.bold('✗ Analysis failed'));
  }

  lines.push(chalk.dim(`  Analysis: ${record.analysisId}`));
  lines.push(chalk.dim(`  Document: ${record.documentId}${record.documentMetadata?.title ? ` (${record.documentMetadata.title})` : ''}`));
  lines.push(chalk.dim(`  Claims: ${record.extractedClaims.length}  Verified: ${record.verifications.length}`));
  if (record.qaConfidence !== null || record.status === 'completed') {
    lines.push(chalk.dim(`  QA confidence: ${record.qaConfidence ?? 'n/a'}  Approved: ${record.approvedForPublication ? 'yes' : 'no'}`));
  }
  for (const error of record.errors) {
    lines.push(chalk.red(`  ${error}`));
  }
  if (savedPath) {
    lines.push(chalk.dim(`  Saved: ${savedPath}`));
  }
  return lines;
}

/** Full view of a stored analysis for `show`. */
export function formatRecord(record: AnalysisRecord): string[] {
  const lines: string[] = [
    `${chalk.bold('Analysis')} ${record.analysisId}  ${statusLabel(record.status)}`,
    chalk.dim(`Document ${record.documentId}  started ${record.startedAt}${record.completedAt ? `  finished ${record.completedAt}` : ''}`),
  ];

  const meta = record.documentMetadata;
  if (meta) {
    lines.push('', chalk.bold('Document'));
    lines.push(`  Title: ${meta.title ?? 'untitled'}`);
    if (meta.authors.length > 0) lines.push(`  Authors: ${meta.authors.join(', ')}`);
    if (meta.publicationDate) lines.push(`  Published: ${meta.publicationDate}`);
    if (meta.institution) lines.push(`  Institution: ${meta.institution}`);
  }

  if (record.extractedClaims.length > 0) {
    lines.push('', chalk.bold(`Claims (${record.extractedClaims.length})`));
    for (const claim of record.extractedClaims) {
      const verification = record.verifications.find(v => v.claimId === claim.id);
      const verdict = verification
        ? `${verification.verificationStatus} ${verification.confidence}`
        : 'not verified';
      lines.push(`  ${claim.id}  ${claim.text}`);
      lines.push(chalk.dim(`    ${claim.type}, confidence ${claim.confidence}, ${verdict}`));
    }
  }

  if (record.qaConfidence !== null || record.qaFeedback !== null) {
    lines.push('', chalk.bold('Quality review'));
    lines.push(`  Confidence: ${record.qaConfidence ?? 'n/a'}  Approved: ${record.approvedForPublication ? 'yes' : 'no'}`);
    if (record.qaFeedback) lines.push(`  ${record.qaFeedback}`);
  }

  if (record.errors.length > 0) {
    lines.push('', chalk.bold.red('Errors'));
    for (const error of record.errors) lines.push(chalk.red(`  ${error}`));
  }

  if (record.reportContent) {
    lines.push('', chalk.bold('Report'), record.reportContent);
  }

  return lines;
}

export function formatAnalysisList(summaries: StoredAnalysisSummary[]): string[] {
  if (summaries.length === 0) return [chalk.dim('No stored analyses.')];
  return summaries.map(s =>
    `${s.analysisId}  ${statusLabel(s.status)}  ${chalk.dim(`${s.claims} claims  ${s.errors} errors  ${s.startedAt}`)}`,
  );
}

export function formatAgent(agent: AgentDefinition, tools: string[]): string[] {
  return [
    `${chalk.bold(agent.name)}  ${chalk.dim(agent.model)}`,
    ...(agent.subAgents.length > 0 ? [chalk.dim(`  sub-agents: ${agent.subAgents.join(', ')}`)] : []),
    chalk.dim(`  tools: ${tools.length > 0 ? tools.join(', ') : 'none'}`),
  ];
}
