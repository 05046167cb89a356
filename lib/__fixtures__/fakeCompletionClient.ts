// lib/__fixtures__/fakeCompletionClient.ts
// In-process stand-in for an LLM provider, used by the unit tests

import type { CompletionClient, CompletionRequest, CompletionResult } from '../llmClient';

type QueuedReply = CompletionResult | Error;

export function reply(...texts: string[]): CompletionResult {
  return { choices: texts };
}

export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: QueuedReply[];

  constructor(replies: QueuedReply[] = []) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('FakeCompletionClient: no reply queued');
    if (next instanceof Error) throw next;
    return next;
  }
}
