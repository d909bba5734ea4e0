/**
 * Parcel Candidate Disambiguation
 *
 * Scores each candidate returned by an envelope query against the input
 * address text and picks one. The scoring is token presence, not edit
 * distance: it only has to separate a handful of neighbouring parcels.
 */

import type { ParcelCandidate, ScoredCandidate, ScoringWeights } from "../types";

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  houseNumber: 10,
  streetWord: 5,
  streetSuffix: 2,
};

/**
 * Uppercase, split on whitespace and commas.
 */
export function tokenizeAddress(address: string): Set<string> {
  return new Set(
    address
      .toUpperCase()
      .split(/[\s,]+/)
      .filter((token) => token.length > 0)
  );
}

function upperTrim(value: string | undefined): string {
  return (value ?? "").trim().toUpperCase();
}

export function scoreCandidate(
  candidate: ParcelCandidate,
  tokens: ReadonlySet<string>,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  let score = 0;

  const houseNumber = upperTrim(candidate.situsHouseNumber);
  if (houseNumber && tokens.has(houseNumber)) {
    score += weights.houseNumber;
  }

  for (const word of upperTrim(candidate.situsStreetName).split(/\s+/)) {
    if (word && tokens.has(word)) {
      score += weights.streetWord;
    }
  }

  const suffix = upperTrim(candidate.situsStreetSuffix);
  if (suffix && tokens.has(suffix)) {
    score += weights.streetSuffix;
  }

  return score;
}

/**
 * Score every candidate, preserving input order.
 */
export function scoreCandidates(
  candidates: readonly ParcelCandidate[],
  inputAddress: string,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): ScoredCandidate[] {
  const tokens = tokenizeAddress(inputAddress);
  return candidates.map((candidate) => ({
    candidate,
    score: scoreCandidate(candidate, tokens, weights),
  }));
}

/**
 * Pick the best candidate.
 *
 * - no candidates → undefined
 * - one candidate, or no address text → that/first candidate, score 0
 * - otherwise highest score; ties go to the earliest candidate in
 *   provider order
 */
export function selectBest(
  candidates: readonly ParcelCandidate[],
  inputAddress: string | undefined,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): ScoredCandidate | undefined {
  if (candidates.length === 0) {
    return undefined;
  }

  if (candidates.length === 1 || !inputAddress || !inputAddress.trim()) {
    return { candidate: candidates[0], score: 0 };
  }

  let best: ScoredCandidate | undefined;
  for (const scored of scoreCandidates(candidates, inputAddress, weights)) {
    if (!best || scored.score > best.score) {
      best = scored;
    }
  }
  return best;
}
