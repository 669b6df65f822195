import { afterEach, describe, it, expect, vi } from 'vitest';
import { DiscordWebhookOutput, formatNotice } from '../src/output/discord-webhook.js';
import { OperatorAlerts } from '../src/output/index.js';
import type { NoticeOutput } from '../src/output/index.js';
import type { OperatorNotice } from '../src/types/index.js';

const LOW: OperatorNotice = {
  kind: 'low_confidence',
  className: 'Bio',
  question: 'Which organelle makes ATP?',
  option: 2,
  rationale: 'depends on the slide',
};

const ERROR: OperatorNotice = {
  kind: 'oracle_error',
  className: 'Bio',
  question: 'Which organelle makes ATP?',
  option: null,
  rationale: 'Invalid option number: 9',
};

class RecordingOutput implements NoticeOutput {
  readonly delivered: OperatorNotice[] = [];
  constructor(readonly enabled: boolean, private readonly result: boolean | Error = true) {}

  async deliver(notice: OperatorNotice): Promise<boolean> {
    this.delivered.push(notice);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('formatNotice', () => {
  it('formats a low-confidence notice with the selected option', () => {
    expect(formatNotice(LOW)).toBe(
      '**[Low confidence]** Bio\nQ: Which organelle makes ATP?\nSelected option 2: depends on the slide',
    );
  });

  it('formats an oracle error with the rationale only', () => {
    expect(formatNotice(ERROR)).toBe('**[Oracle error]** Bio\nQ: Which organelle makes ATP?\nInvalid option number: 9');
  });
});

describe('OperatorAlerts', () => {
  it('delivers to enabled outputs only', async () => {
    const on = new RecordingOutput(true);
    const off = new RecordingOutput(false);

    await new OperatorAlerts([on, off]).notify(LOW);

    expect(on.delivered).toEqual([LOW]);
    expect(off.delivered).toEqual([]);
  });

  it('does not throw when every output fails', async () => {
    const broken = new RecordingOutput(true, new Error('webhook down'));
    const refusing = new RecordingOutput(true, false);

    await expect(new OperatorAlerts([broken, refusing]).notify(ERROR)).resolves.toBeUndefined();
    expect(broken.delivered).toHaveLength(1);
    expect(refusing.delivered).toHaveLength(1);
  });
});

describe('DiscordWebhookOutput', () => {
  it('is disabled without a webhook url', async () => {
    const output = new DiscordWebhookOutput('');
    expect(output.enabled).toBe(false);
    expect(await output.deliver(LOW)).toBe(false);
  });

  it('posts the notice without allowing mentions', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);

    const delivered = await new DiscordWebhookOutput('https://hooks.example.test/alerts').deliver(LOW);

    expect(delivered).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://hooks.example.test/alerts');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      content: formatNotice(LOW),
      username: 'Class Poll Watcher',
      allowed_mentions: { parse: [] },
    });
  });

  it('reports a rejected webhook as undelivered', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));
    expect(await new DiscordWebhookOutput('https://hooks.example.test/alerts').deliver(ERROR)).toBe(false);
  });
});
