/**
 * Operator notices to Discord via webhook.
 */

import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import type { OperatorNotice } from '../types/index.js';

const NOTICE_TITLES: Record<OperatorNotice['kind'], string> = {
  low_confidence: 'Low confidence',
  oracle_error: 'Oracle error',
};

export function formatNotice(notice: OperatorNotice): string {
  const head = `**[${NOTICE_TITLES[notice.kind]}]** ${notice.className}`;
  const question = `Q: ${notice.question.slice(0, 200)}`;
  const detail = notice.option !== null
    ? `Selected option ${notice.option}: ${notice.rationale.slice(0, 300)}`
    : notice.rationale.slice(0, 300);
  return [head, question, detail].join('\n');
}

export class DiscordWebhookOutput {
  constructor(private readonly webhookUrl = getConfig().operatorWebhookUrl) {}

  get enabled(): boolean {
    return this.webhookUrl !== '';
  }

  async deliver(notice: OperatorNotice): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }

    const body = {
      content: formatNotice(notice),
      username: 'Class Poll Watcher',
      // Question text comes from the page — never let it ping anyone
      allowed_mentions: { parse: [] },
    };

    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        logger.warn(`DiscordWebhookOutput: webhook returned ${response.status}`);
        return false;
      }

      logger.debug(`DiscordWebhookOutput: delivered ${notice.kind} for ${notice.className}`);
      return true;
    } catch (err) {
      logger.error('DiscordWebhookOutput: failed to deliver:', err);
      return false;
    }
  }
}
