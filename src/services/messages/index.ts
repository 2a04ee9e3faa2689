export { HttpMessageSource } from './http-source';
export { normalizeMessages, toMessageCandidates, unwrapPayload } from './normalize';
export type { HttpMessageSourceOptions, Message, MessageCandidate, MessageSource } from './types';
