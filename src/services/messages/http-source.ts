import { createLogger } from '@utils/logger';
import { UpstreamError, toError } from '@utils/errors';
import { normalizeMessages } from './normalize';
import type { HttpMessageSourceOptions, Message, MessageSource } from './types';

const logger = createLogger('message-source');

/**
 * Reads the member message collection over HTTP.
 *
 * One fetch per call: nothing is cached between requests.
 */
export class HttpMessageSource implements MessageSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpMessageSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPayload(): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const error = toError(err);
      logger.warn({ err: error, url: this.options.url }, 'Upstream fetch failed');
      throw new UpstreamError(`Failed to fetch member messages from upstream API: ${error.message}`);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new UpstreamError(
        `Failed to fetch member messages from upstream API: ${response.status} ${response.statusText}`,
        { status: response.status }
      );
    }

    try {
      return await response.json();
    } catch {
      throw new UpstreamError('Unexpected upstream format: response is not valid JSON.');
    }
  }

  async fetchMessages(): Promise<Message[]> {
    const messages = normalizeMessages(await this.fetchPayload());
    logger.debug({ count: messages.length }, 'Messages loaded');
    return messages;
  }
}
