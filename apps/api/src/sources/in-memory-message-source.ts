import type { DateWindow, SourceMessage } from '@weighbridge/shared-types';

import { windowToInstants } from '../parsers/utils/date-parser.js';

import type { MessageSource } from './message-source.js';

export function isWithinWindow(receivedAt: Date, window: DateWindow): boolean {
  const { start, end } = windowToInstants(window.fromDate, window.toDate);
  const ms = receivedAt.getTime();
  return ms >= start.getTime() && ms < end.getTime();
}

export class InMemoryMessageSource implements MessageSource {
  private readonly messages: SourceMessage[];

  constructor(messages: Iterable<SourceMessage> = []) {
    this.messages = [...messages];
  }

  add(message: SourceMessage): void {
    this.messages.push(message);
  }

  async fetchMessages(window: DateWindow): Promise<SourceMessage[]> {
    return this.messages.filter((message) => isWithinWindow(message.receivedAt, window));
  }
}
