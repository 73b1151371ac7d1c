import { z } from 'zod';
import { DecodeError } from '../errors.js';
import type { DocumentMetadata, ExtractedClaim, QualityReview, VerificationResult } from './state.js';

// ---------------------------------------------------------------------------
// JSON extraction
// ---------------------------------------------------------------------------

const FENCE_PATTERN = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Outermost `{…}` or `[…]` span, whichever opens first. */
function bracketedBlock(text: string): string | undefined {
  const brace = text.indexOf('{');
  const bracket = text.indexOf('[');
  const candidates: Array<[number, string]> = [];
  if (brace !== -1) candidates.push([brace, '}']);
  if (bracket !== -1) candidates.push([bracket, ']']);
  candidates.sort((a, b) => a[0] - b[0]);

  for (const [start, close] of candidates) {
    const end = text.lastIndexOf(close);
    if (end > start) return text.slice(start, end + 1);
  }
  return undefined;
}

/**
 * Parses agent output as JSON. Markdown code fences are stripped first;
 * when that fails the first bracketed block is tried.
 */
export function extractJson(agentName: string, output: string): unknown {
  const fenced = FENCE_PATTERN.exec(output);
  const body = (fenced ? fenced[1] : output).trim();

  const direct = tryParse(body);
  if (direct.ok) return direct.value;

  const block = bracketedBlock(body);
  if (block !== undefined) {
    const nested = tryParse(block);
    if (nested.ok) return nested.value;
  }

  throw new DecodeError(agentName, output, 'Agent output is not valid JSON');
}

// ---------------------------------------------------------------------------
// Field policies
// ---------------------------------------------------------------------------

const nullableString = z.string().nullable().catch(null);

const stringList = z.array(z.unknown())
  .catch([])
  .transform(items => items.filter((item): item is string => typeof item === 'string'));

const MetadataSchema = z.object({
  title: nullableString,
  authors: stringList,
  publication_date: nullableString,
  institution: nullableString,
  abstract: nullableString,
  keywords: stringList,
});

const ClaimSchema = z.object({
  text: z.string().catch(''),
  type: z.string().min(1).catch('unknown'),
  location: nullableString,
  confidence: z.number().min(0).max(1).catch(0.5),
  supporting_text: nullableString,
});

const VerificationSchema = z.object({
  verification_status: z.string().min(1).catch('uncertain'),
  confidence: z.number().min(0).max(100).catch(0),
  supporting_sources: stringList,
  contradicting_sources: stringList,
  notes: nullableString,
});

const QualityReviewSchema = z.object({
  feedback: nullableString,
  confidence: z.number().min(0).max(100).nullable().catch(null),
  approved_for_publication: z.boolean().catch(false),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(agentName: string, output: string, value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new DecodeError(agentName, output, `Expected a JSON object for ${what}`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Phase decoders
// ---------------------------------------------------------------------------

/** Reads the `metadata` object, or the top-level object when there is none. */
export function decodeMetadata(agentName: string, output: string): DocumentMetadata {
  const payload = requireObject(agentName, output, extractJson(agentName, output), 'document metadata');
  const source = isRecord(payload.metadata) ? payload.metadata : payload;
  const m = MetadataSchema.parse(source);
  return {
    title: m.title,
    authors: m.authors,
    publicationDate: m.publication_date,
    institution: m.institution,
    abstract: m.abstract,
    keywords: m.keywords,
  };
}

export type ClaimDraft = Omit<ExtractedClaim, 'id'>;

/**
 * Accepts a bare array or an object with a `claims` array. Entries that
 * are not objects or have no text are dropped.
 */
export function decodeClaims(agentName: string, output: string): ClaimDraft[] {
  const payload = extractJson(agentName, output);

  let entries: unknown[];
  if (Array.isArray(payload)) {
    entries = payload;
  } else if (isRecord(payload)) {
    if (payload.claims === undefined || payload.claims === null) {
      entries = [];
    } else if (Array.isArray(payload.claims)) {
      entries = payload.claims;
    } else {
      throw new DecodeError(agentName, output, 'Expected "claims" to be an array');
    }
  } else {
    throw new DecodeError(agentName, output, 'Expected a JSON array or object for claims');
  }

  const claims: ClaimDraft[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const c = ClaimSchema.parse(entry);
    const text = c.text.trim();
    if (!text) continue;
    claims.push({
      text,
      type: c.type,
      location: c.location,
      confidence: c.confidence,
      supportingText: c.supporting_text,
    });
  }
  return claims;
}

export function decodeVerification(
  agentName: string,
  output: string,
  claim: Pick<ExtractedClaim, 'id' | 'text'>,
): VerificationResult {
  const payload = requireObject(agentName, output, extractJson(agentName, output), 'verification');
  const v = VerificationSchema.parse(payload);
  return {
    claimId: claim.id,
    claimText: claim.text,
    verificationStatus: v.verification_status,
    confidence: v.confidence,
    supportingSources: v.supporting_sources,
    contradictingSources: v.contradicting_sources,
    notes: v.notes,
  };
}

export function decodeQualityReview(agentName: string, output: string): QualityReview {
  const payload = requireObject(agentName, output, extractJson(agentName, output), 'quality review');
  const q = QualityReviewSchema.parse(payload);
  return {
    feedback: q.feedback,
    confidence: q.confidence,
    approvedForPublication: q.approved_for_publication,
  };
}
