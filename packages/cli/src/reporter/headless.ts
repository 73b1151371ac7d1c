import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type {
  ClaimVerifiedEvent,
  PhaseCompleteEvent,
  PhaseErrorEvent,
  PhaseStartEvent,
  ToolUnavailableEvent,
  WorkflowOrchestrator,
} from '@factsieve/core';

export interface HeadlessReporterOptions {
  verbose?: boolean;
}

const PHASE_LABELS: Record<PhaseStartEvent['phase'], string> = {
  document_processing: 'Document processing',
  claim_extraction: 'Fact extraction',
  verification: 'Verification',
  report_generation: 'Report generation',
  quality_review: 'Quality review',
};

/**
 * Prints workflow progress with one spinner per phase. Returns a function
 * that detaches the listeners.
 */
export function attachHeadlessReporter(
  orchestrator: WorkflowOrchestrator,
  options: HeadlessReporterOptions = {},
): () => void {
  let activeSpinner: Ora | undefined;

  const onPhaseStart = (event: PhaseStartEvent) => {
    activeSpinner = ora({
      text: `${chalk.bold(PHASE_LABELS[event.phase])} ${chalk.dim(`${event.phaseIndex + 1}/${event.totalPhases}  ${event.agent} (${event.model})`)}`,
      prefixText: chalk.dim(' '),
    }).start();
  };

  const onPhaseComplete = (event: PhaseCompleteEvent) => {
    activeSpinner?.succeed(
      `${chalk.bold(PHASE_LABELS[event.phase])}` + chalk.dim(`  ${(event.durationMs / 1000).toFixed(1)}s`),
    );
    activeSpinner = undefined;
  };

  const onPhaseError = (event: PhaseErrorEvent) => {
    activeSpinner?.fail(`${chalk.bold(PHASE_LABELS[event.phase])} ${chalk.red(event.error.message)}`);
    activeSpinner = undefined;
  };

  const onClaimVerified = (event: ClaimVerifiedEvent) => {
    if (!options.verbose) {
      if (activeSpinner) activeSpinner.text = `${chalk.bold('Verification')} ${chalk.dim(`${event.index + 1}/${event.total}`)}`;
      return;
    }
    activeSpinner?.clear();
    console.log(chalk.dim(`    ${event.claim.id} ${event.result.verificationStatus} (${event.result.confidence})  ${event.claim.text.slice(0, 80)}`));
    activeSpinner?.render();
  };

  const onToolUnavailable = (event: ToolUnavailableEvent) => {
    console.error(chalk.yellow(`  Warning: MCP server "${event.serverName}" unavailable for ${event.agent}: ${event.error.message}`));
  };

  orchestrator.on('phase:start', onPhaseStart);
  orchestrator.on('phase:complete', onPhaseComplete);
  orchestrator.on('phase:error', onPhaseError);
  orchestrator.on('claim:verified', onClaimVerified);
  orchestrator.on('tool:unavailable', onToolUnavailable);

  return () => {
    activeSpinner?.stop();
    orchestrator.off('phase:start', onPhaseStart);
    orchestrator.off('phase:complete', onPhaseComplete);
    orchestrator.off('phase:error', onPhaseError);
    orchestrator.off('claim:verified', onClaimVerified);
    orchestrator.off('tool:unavailable', onToolUnavailable);
  };
}
