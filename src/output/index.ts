/**
 * Operator notification fan-out — delivers to all configured outputs in parallel.
 * Never throws into the caller.
 */

import { logger } from '../logger.js';
import { DiscordWebhookOutput } from './discord-webhook.js';
import type { OperatorNotice, OperatorNotifier } from '../types/index.js';

export interface NoticeOutput {
  readonly enabled: boolean;
  deliver(notice: OperatorNotice): Promise<boolean>;
}

export class OperatorAlerts implements OperatorNotifier {
  private outputs: NoticeOutput[];

  constructor(outputs: NoticeOutput[] = [new DiscordWebhookOutput()]) {
    this.outputs = outputs.filter(o => o.enabled);
  }

  async notify(notice: OperatorNotice): Promise<void> {
    const summary = notice.kind === 'oracle_error'
      ? `oracle error on "${notice.question.slice(0, 60)}": ${notice.rationale.slice(0, 80)}`
      : `low confidence on "${notice.question.slice(0, 60)}", selected option ${notice.option}`;
    logger.scoped(notice.className).warn(`Operator notice: ${summary}`);

    if (this.outputs.length === 0) return;

    const results = await Promise.allSettled(this.outputs.map(o => o.deliver(notice)));
    const delivered = results.filter(
      r => r.status === 'fulfilled' && r.value === true
    ).length;

    if (delivered === 0) {
      logger.warn('OperatorAlerts: failed to deliver to any output');
    }
  }
}
