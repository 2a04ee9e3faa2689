/**
 * Message Types
 */

export interface Message {
  memberId: string | null;
  memberName: string;
  /** Trimmed, never empty */
  text: string;
  /** Passed through from upstream untouched */
  timestamp: unknown;
}

/** A coalesced upstream record before blank texts are dropped */
export type MessageCandidate = Message;

export interface MessageSource {
  fetchMessages(): Promise<Message[]>;
}

export interface HttpMessageSourceOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}
