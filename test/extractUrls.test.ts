import { describe, expect, it } from 'vitest';

import { extractUrls } from '../src/scraper/extractUrls.js';
import type { TestLogger } from './support/fakes.js';
import { createTestLogger, failures, FakeTransport, recordingSleep } from './support/fakes.js';

const TARGET = 'https://a.example/';

function messagesOf(mock: TestLogger['error']): unknown[] {
  return mock.mock.calls.map((call) => call[1]);
}

describe('extractUrls', () => {
  it('recovers from transient failures and returns the cleaned hostnames', async () => {
    const transport = new FakeTransport({
      [TARGET]: [...failures(2), '<p><a target="_self" href="https://Example.com/">x</a></p>'],
    });
    const { sleep } = recordingSleep();

    const urls = await extractUrls({
      targetUrl: TARGET,
      createTransport: () => transport,
      sleep,
      logger: createTestLogger(),
    });

    expect(urls).toEqual(new Set(['example.com']));
    expect(transport.callsFor(TARGET)).toBe(3);
  });

  it('returns an empty set and logs once when the page cannot be fetched', async () => {
    const transport = new FakeTransport({ [TARGET]: failures(1) });
    const { sleep } = recordingSleep();
    const logger = createTestLogger();

    const urls = await extractUrls({
      targetUrl: TARGET,
      createTransport: () => transport,
      sleep,
      logger,
    });

    expect(urls.size).toBe(0);
    expect(transport.callsFor(TARGET)).toBe(5);
    const inaccessible = messagesOf(logger.error).filter(
      (message) => message === 'Trusted sites page content not accessible',
    );
    expect(inaccessible).toHaveLength(1);
  });

  it('deduplicates hostnames and drops anchors that clean to nothing', async () => {
    const html = `
      <p>
        <a target="_blank" href="https://www.example.com/">one</a>
        <a target="_self" href="http://example.com">two</a>
        <a target="_blank" href="https://sub.example.org/path/">three</a>
        <a target="_self">no href</a>
        <a target="_self" href="/relative">relative</a>
        <a href="https://untargeted.example.net/">untargeted</a>
      </p>
      <div><a target="_self" href="https://outside.example.net/">outside</a></div>
    `;
    const transport = new FakeTransport({ [TARGET]: [html] });
    const { sleep } = recordingSleep();

    const urls = await extractUrls({
      targetUrl: TARGET,
      createTransport: () => transport,
      sleep,
      logger: createTestLogger(),
    });

    expect([...urls].sort()).toEqual(['example.com', 'sub.example.org']);
  });

  it('reads the table-body layout when asked to', async () => {
    const html = `
      <table><tbody>
        <tr><td><a href="https://www.alpha.com/">alpha</a></td></tr>
        <tr><td><a href="https://beta.org">beta</a></td></tr>
      </tbody></table>
    `;
    const transport = new FakeTransport({ [TARGET]: [html] });
    const { sleep } = recordingSleep();

    const urls = await extractUrls({
      targetUrl: TARGET,
      layout: 'table-body',
      createTransport: () => transport,
      sleep,
      logger: createTestLogger(),
    });

    expect([...urls].sort()).toEqual(['alpha.com', 'beta.org']);
  });

  it('warns separately when the page loads but yields no URLs', async () => {
    const transport = new FakeTransport({ [TARGET]: ['<html><body><p>Nothing here</p></body></html>'] });
    const { sleep } = recordingSleep();
    const logger = createTestLogger();

    const urls = await extractUrls({
      targetUrl: TARGET,
      createTransport: () => transport,
      sleep,
      logger,
    });

    expect(urls.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      { url: TARGET, layout: 'paragraph' },
      'No URLs extracted from target page',
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('contains unexpected faults and returns an empty set', async () => {
    const logger = createTestLogger();

    const urls = await extractUrls({
      targetUrl: TARGET,
      createTransport: () => {
        throw new Error('transport unavailable');
      },
      logger,
    });

    expect(urls.size).toBe(0);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[1]).toBe(
      '[internal/fatal] transport unavailable (stage="extract" url="https://a.example/")',
    );
  });
});
