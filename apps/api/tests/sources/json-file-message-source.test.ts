import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SourceUnavailableError } from '../../src/errors.js';
import { InMemoryMessageSource } from '../../src/sources/in-memory-message-source.js';
import { JsonFileMessageSource } from '../../src/sources/json-file-message-source.js';
import { EXPECTED_SENDER, SINGLE_SECTION_BODY, reportMessage } from '../fixtures/reports.js';

const WINDOW = { fromDate: '2024-01-03', toDate: '2024-01-04' };

describe('JsonFileMessageSource', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'weighbridge-source-'));
    file = join(dir, 'messages.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the messages received inside the window', async () => {
    await writeFile(
      file,
      JSON.stringify({
        messages: [
          {
            senderAddress: EXPECTED_SENDER,
            senderDisplayName: 'Weighbridge Scale',
            subject: 'Weigh Bridge Report',
            body: SINGLE_SECTION_BODY,
            receivedAt: '2024-01-03T08:30:00',
          },
          { subject: 'Weigh Bridge Report', receivedAt: '2024-01-04T23:59:00' },
          { subject: 'Weigh Bridge Report', receivedAt: '2024-01-05T00:00:00' },
          { subject: 'Weigh Bridge Report', receivedAt: '2024-01-02T23:59:59' },
        ],
      })
    );

    const messages = await new JsonFileMessageSource(file).fetchMessages(WINDOW);

    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({
      senderAddress: EXPECTED_SENDER,
      senderDisplayName: 'Weighbridge Scale',
      subject: 'Weigh Bridge Report',
      body: SINGLE_SECTION_BODY,
      receivedAt: new Date(2024, 0, 3, 8, 30),
    });
    expect(messages[1]?.senderAddress).toBe('');
    expect(messages[1]?.receivedAt).toEqual(new Date(2024, 0, 4, 23, 59));
  });

  it('fails when the file is missing', async () => {
    const source = new JsonFileMessageSource(join(dir, 'missing.json'));

    await expect(source.fetchMessages(WINDOW)).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(source.fetchMessages(WINDOW)).rejects.toThrow(/^Cannot read message source /);
  });

  it('fails on malformed JSON', async () => {
    await writeFile(file, '{"messages": [');

    await expect(new JsonFileMessageSource(file).fetchMessages(WINDOW)).rejects.toThrow(
      `Message source ${file} is not valid JSON`
    );
  });

  it('fails when the document has the wrong shape', async () => {
    await writeFile(file, JSON.stringify({ items: [] }));

    await expect(new JsonFileMessageSource(file).fetchMessages(WINDOW)).rejects.toThrow(
      `Message source ${file} has an unexpected shape: Required`
    );
  });
});

describe('InMemoryMessageSource', () => {
  it('includes the start of the window and excludes the day after it', async () => {
    const source = new InMemoryMessageSource([
      reportMessage({ subject: 'start', receivedAt: new Date(2024, 0, 3, 0, 0) }),
      reportMessage({ subject: 'end', receivedAt: new Date(2024, 0, 5, 0, 0) }),
    ]);
    source.add(reportMessage({ subject: 'late', receivedAt: new Date(2024, 0, 4, 23, 59) }));

    const messages = await source.fetchMessages(WINDOW);

    expect(messages.map((m) => m.subject)).toEqual(['start', 'late']);
  });
});
