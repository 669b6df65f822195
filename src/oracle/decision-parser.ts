/**
 * Pure functions for turning the oracle's text response into an OracleDecision.
 */

import type { OracleDecision } from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Extract the first balanced `{...}` object from free text.
 * Braces inside JSON strings are skipped.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Parse the oracle response for a question with `optionCount` options.
 *
 * Expected shape:
 *   { "analysis": { "question_type", "reasoning" },
 *     "answer": { "best_option", "confidence", "explanation" } }
 *
 * An option outside [1, optionCount] is an error whatever the confidence.
 * A missing or unrecognized confidence counts as low.
 */
export function parseOracleResponse(text: string, optionCount: number): OracleDecision {
  const raw = text.trim();
  const json = extractJsonObject(raw);
  if (!json) {
    return { status: 'error', rationale: 'No JSON object in oracle response', raw };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    return {
      status: 'error',
      rationale: `Could not parse JSON: ${err instanceof Error ? err.message : String(err)}`,
      raw,
    };
  }
  if (!isRecord(parsed)) {
    return { status: 'error', rationale: 'Oracle response is not a JSON object', raw };
  }

  const analysis = isRecord(parsed.analysis) ? parsed.analysis : {};
  const answer = isRecord(parsed.answer) ? parsed.answer : {};

  const bestOption = answer.best_option;
  if (typeof bestOption !== 'number' || !Number.isInteger(bestOption) || bestOption < 1 || bestOption > optionCount) {
    return { status: 'error', rationale: `Invalid option number: ${JSON.stringify(bestOption ?? null)}`, raw };
  }

  const questionType = stringField(analysis, 'question_type') || 'unknown';
  const reasoning = stringField(analysis, 'reasoning');
  const explanation = stringField(answer, 'explanation');
  const rationale = [reasoning, explanation].filter(Boolean).join(' — ');

  const confidence = stringField(answer, 'confidence').trim().toLowerCase();
  if (confidence === 'high' || confidence === 'medium') {
    return { status: 'answered', option: bestOption, confidence, rationale, questionType };
  }
  return { status: 'low_confidence', option: bestOption, confidence: 'low', rationale, questionType };
}
