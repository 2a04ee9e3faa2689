#!/usr/bin/env npx tsx
/**
 * Data-quality report for the upstream member message collection.
 *
 * Usage:
 *   npm run inspect:data
 *   MEMBER_MESSAGES_API=http://localhost:8080/messages npm run inspect:data
 */

import { HttpMessageSource, toMessageCandidates, unwrapPayload } from '../src/services/messages';
import { collectInsights, snippet } from '../src/services/messages/insights';

const API_URL =
  process.env.MEMBER_MESSAGES_API || 'https://november7-730026606190.europe-west1.run.app/messages';
const TIMEOUT_MS = Number(process.env.UPSTREAM_TIMEOUT_MS || 20000);

// ANSI colors
const colors = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
};

const count = (value: number): string =>
  `${value === 0 ? colors.green : colors.yellow}${value}${colors.reset}`;

async function main() {
  console.log(`${colors.bold}Member message data report${colors.reset}`);
  console.log(`Source: ${API_URL}\n`);

  const source = new HttpMessageSource({ url: API_URL, timeoutMs: TIMEOUT_MS });
  const payload = await source.fetchPayload();
  const insights = collectInsights(toMessageCandidates(payload), unwrapPayload(payload).length);

  console.log(`Total messages:          ${insights.total}`);
  console.log(`Blank messages:          ${count(insights.blank)}`);
  console.log(`Unparseable timestamps:  ${count(insights.unparseableTimestamps)}`);
  console.log(`Repeated message texts:  ${count(insights.duplicates.length)}`);
  console.log(`Members with conflicts:  ${count(insights.conflicts.length)}`);

  if (insights.duplicates.length > 0) {
    console.log(`\n${colors.cyan}━━━ Most repeated texts ━━━${colors.reset}`);
    for (const { text, count: times } of insights.duplicates.slice(0, 5)) {
      console.log(`  ${times}x "${snippet(text)}"`);
    }
  }

  if (insights.conflicts.length > 0) {
    console.log(`\n${colors.cyan}━━━ Possible numeric conflicts ━━━${colors.reset}`);
    for (const { memberName, values } of insights.conflicts.slice(0, 5)) {
      const tuples = values.map((numbers) => `(${numbers.join(', ')})`).join(' vs ');
      console.log(`  ${memberName || '(unnamed)'}: ${tuples}`);
    }
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${colors.red}✗ ${message}${colors.reset}`);
  process.exit(1);
});
