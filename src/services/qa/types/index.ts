import type { OperationContext } from '@core/orchestration';
import type { Message, MessageSource } from '@services/messages';
import type { Ranker } from '@services/ranking';

/**
 * Question Answering Types
 */

export type QuestionKind = 'numeric' | 'when' | 'where' | 'favorite' | 'other';

/**
 * - extracted: a short value pulled out of a ranked message
 * - fallback: open-ended question, best-ranked message returned as is
 * - abstained: not enough evidence, the fixed "I don't know" answer
 */
export type AnswerOutcome = 'extracted' | 'fallback' | 'abstained';

export interface Answer {
  text: string;
  outcome: AnswerOutcome;
}

export type MemberResolution =
  /** The question names (or mentions) known members; search only their messages */
  | { status: 'scoped'; messages: Message[]; candidates: string[] }
  /** No names in the question; search everything */
  | { status: 'unscoped'; messages: Message[]; candidates: string[] }
  /** The question names someone we have no messages for */
  | { status: 'unknown-member'; candidates: string[] };

/**
 * Decides which members a question is about.
 */
export interface MemberResolver {
  resolve(question: string, messages: Message[]): MemberResolution;
}

export interface RankedContext {
  message: Message;
  /** Position in the search space */
  index: number;
  score: number;
}

export interface Extraction {
  text: string;
  /** Zero-based position among the ranked contexts */
  rank: number;
  message: Message;
}

export interface QaPolicy {
  /** Ranked messages handed to the extractor */
  topK: number;
}

export interface QaDependencies {
  source: MessageSource;
  resolver: MemberResolver;
  ranker: Ranker;
}

export interface QaInput {
  question: string;
  requestId?: string;
  policy?: Partial<QaPolicy>;
}

export interface QaContext extends OperationContext {
  question: string;
  policy: QaPolicy;
  deps: QaDependencies;

  // Pipeline outputs
  messages?: Message[];
  kind?: QuestionKind;
  resolution?: MemberResolution;
  searchSpace?: Message[];
  rankedContexts?: RankedContext[];
  extractions?: Extraction[];
  answer?: Answer;
}

export interface QaResult {
  answer: string;
  outcome: AnswerOutcome;
  kind: QuestionKind;
  reasonCodes: string[];
}
