import type { BaseMessage } from '@langchain/core/messages';

export const COMPLETION_MODEL = Symbol('COMPLETION_MODEL');

/** A message chunk as the chat model returns it; content may be a string or parts. */
export interface ModelOutput {
  content: unknown;
}

/**
 * The slice of a LangChain chat model the service relies on. ChatOpenAI
 * satisfies it; tests provide a plain object.
 */
export interface CompletionModel {
  invoke(messages: BaseMessage[]): Promise<ModelOutput>;
  stream(messages: BaseMessage[]): Promise<AsyncIterable<ModelOutput>>;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}
