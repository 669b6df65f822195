/**
 * Answer oracle backed by Claude. One request per question, no tools.
 * Transport and parse failures are folded into status 'error'.
 */

import fs from 'node:fs';
import Anthropic from '@anthropic-ai/sdk';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { parseOracleResponse } from './decision-parser.js';
import type { AnswerOracle, OracleDecision } from '../types/index.js';

const DEFAULT_SYSTEM_PROMPT = `You answer multiple choice poll questions.
Always pick the single best option. Use confidence "low" when the question depends on context you cannot see or you are guessing.
Respond with only JSON: {"analysis":{"question_type":"...","reasoning":"..."},"answer":{"best_option":<n>,"confidence":"high"|"medium"|"low","explanation":"..."}}`;

/** User message listing the question and its numbered options. */
export function buildQuestionMessage(question: string, options: readonly string[]): string {
  const list = options.map((opt, i) => `  ${i + 1}. ${opt}`).join('\n');
  return [
    `QUESTION: ${question}`,
    '',
    'OPTIONS:',
    list,
    '',
    `best_option must be an integer from 1 to ${options.length}. Respond with only the JSON object.`,
  ].join('\n');
}

export class ClaudeAnswerOracle implements AnswerOracle {
  private client: Anthropic;
  private systemPrompt = DEFAULT_SYSTEM_PROMPT;

  constructor(client?: Anthropic) {
    const config = getConfig();
    this.client = client ?? new Anthropic({ apiKey: config.anthropicApiKey });
  }

  loadPrompt(): void {
    const config = getConfig();
    try {
      this.systemPrompt = fs.readFileSync(config.oraclePromptPath, 'utf-8');
      logger.info(`AnswerOracle: loaded system prompt from ${config.oraclePromptPath}`);
    } catch (err) {
      logger.warn('AnswerOracle: failed to load system prompt, using default:', err);
      this.systemPrompt = DEFAULT_SYSTEM_PROMPT;
    }
  }

  async ask(question: string, options: readonly string[]): Promise<OracleDecision> {
    const config = getConfig();

    try {
      const response = await this.client.messages.create({
        model: config.anthropicModel,
        max_tokens: config.oracleMaxTokens,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: buildQuestionMessage(question, options) }],
      });

      const text = response.content
        .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
        .map(b => b.text)
        .join('\n')
        .trim();

      if (!text) {
        return { status: 'error', rationale: 'Empty response from oracle', raw: '' };
      }
      return parseOracleResponse(text, options.length);
    } catch (err) {
      logger.error('AnswerOracle: request failed:', err);
      return {
        status: 'error',
        rationale: err instanceof Error ? err.message : String(err),
        raw: '',
      };
    }
  }
}
