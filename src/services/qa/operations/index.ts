/**
 * QA Operations
 * Barrel export
 */

export * from './validate-input';
export * from './load-messages';
export * from './classify-question';
export * from './resolve-member';
export * from './filter-relevant';
export * from './rank-contexts';
export * from './extract-answers';
export * from './decide-answer';
