export type ChatResponseKind = 'instant' | 'completion';

export interface ChatResponseDto {
  response: string;
  kind: ChatResponseKind;
  /** Model that produced the answer, or "instant" for canned replies. */
  model: string;
  marketDataIncluded: boolean;
  timestamp: string;
}

export type ChatStreamEvent =
  | { content: string }
  | { done: true; kind: ChatResponseKind; model: string; marketDataIncluded: boolean; timestamp: string }
  | { error: string; statusCode: number };
