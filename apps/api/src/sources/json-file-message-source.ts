import { readFile } from 'fs/promises';

import type { DateWindow, SourceMessage } from '@weighbridge/shared-types';
import { MessageFileSchema } from '@weighbridge/shared-validation';

import { SourceUnavailableError, errorMessage } from '../errors.js';

import { isWithinWindow } from './in-memory-message-source.js';
import type { MessageSource } from './message-source.js';

/**
 * Reads an exported mailbox: `{ "messages": [{ senderAddress, senderDisplayName,
 * subject, body, receivedAt }] }`. The file is re-read on every fetch.
 */
export class JsonFileMessageSource implements MessageSource {
  constructor(private readonly filePath: string) {}

  async fetchMessages(window: DateWindow): Promise<SourceMessage[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new SourceUnavailableError(`Cannot read message source ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new SourceUnavailableError(`Message source ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = MessageFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceUnavailableError(
        `Message source ${this.filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        { cause: parsed.error }
      );
    }

    console.log(`[SYNC] Read ${parsed.data.messages.length} messages from ${this.filePath}`);
    return parsed.data.messages.filter((message) => isWithinWindow(message.receivedAt, window));
  }
}
