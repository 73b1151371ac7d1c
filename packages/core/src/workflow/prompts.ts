import type { AnalysisState, ExtractedClaim } from '../analysis/state.js';

const PREVIEW_CHARS = 1000;

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}\n...` : text;
}

export function documentProcessingPrompt(documentPath: string, content: string): string {
  return [
    'Parse and analyze the following document.',
    '',
    `Path: ${documentPath}`,
    `Content length: ${content.length} characters`,
    '',
    'Content preview:',
    preview(content),
    '',
    'Extract the document metadata: title, authors, publication date, institution, abstract and keywords.',
    'Also note the document structure, tables, references and any quality issues.',
    '',
    'Respond with JSON: {"metadata": {"title", "authors", "publication_date", "institution", "abstract", "keywords"}, "structure", "tables", "references", "quality_issues"}',
  ].join('\n');
}

export function claimExtractionPrompt(state: AnalysisState): string {
  const title = state.documentMetadata?.title ?? 'Unknown';
  return [
    `Extract every factual claim from the document "${title}".`,
    'For each claim identify:',
    '- the claim text',
    '- its type (quantitative, qualitative, causal, ...)',
    '- where it appears (section or page)',
    '- your confidence that it is a claim, from 0 to 1',
    '- the supporting excerpt from the document',
    '',
    'Respond with JSON: {"claims": [{"text", "type", "location", "confidence", "supporting_text"}]}',
  ].join('\n');
}

export function verificationPrompt(claim: ExtractedClaim): string {
  return [
    'Verify the following claim using authoritative sources.',
    '',
    `Claim: ${claim.text}`,
    `Type: ${claim.type}`,
    ...(claim.supportingText ? [`Excerpt: ${claim.supportingText}`] : []),
    '',
    'Look for supporting evidence, contradicting evidence, relevant studies and expert consensus.',
    '',
    'Respond with JSON: {"verification_status": "supported" | "contradicted" | "uncertain" | "unverifiable", "confidence": 0-100, "supporting_sources": [], "contradicting_sources": [], "notes"}',
  ].join('\n');
}

export function reportPrompt(state: AnalysisState): string {
  const title = state.documentMetadata?.title ?? 'Unknown';
  return [
    'Write a comprehensive analysis report.',
    '',
    `Document: ${title}`,
    `Claims analyzed: ${state.extractedClaims.length}`,
    `Verifications completed: ${state.verifications.length}`,
    '',
    'Include an executive summary, a document overview, each claim with its verification result,',
    'key findings and recommendations, and confidence scores.',
    '',
    'Format the report as markdown with sections.',
  ].join('\n');
}

export function qualityReviewPrompt(state: AnalysisState): string {
  return [
    'Review the quality and accuracy of this analysis report.',
    '',
    'Report preview:',
    state.reportContent ? preview(state.reportContent) : 'No report',
    '',
    'Check logical consistency, evidence quality, whether confidence scores are appropriate,',
    'and citation completeness.',
    '',
    'Respond with JSON: {"feedback", "confidence": 0-100, "approved_for_publication": true | false}',
  ].join('\n');
}

/** Claims joined with their verifications, for the report writer's context. */
export function reportContext(state: AnalysisState): Record<string, unknown> {
  return {
    metadata: state.documentMetadata,
    claims: state.extractedClaims.map(claim => ({
      ...claim,
      verification: state.verifications.find(v => v.claimId === claim.id) ?? null,
    })),
  };
}
