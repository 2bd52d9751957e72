import { Inject, Injectable, Logger } from '@nestjs/common';
import { AGENT_CONFIG, AgentConfig } from '../../config/agent-config';

/**
 * Raw DuckDuckGo Instant Answer payload. Field shapes vary by query type,
 * so values are inspected by the formatter rather than trusted.
 */
export type InstantAnswer = Readonly<Record<string, unknown>>;

/**
 * Failure talking to the search provider. The message is the text handed
 * back to the completion service once retries are exhausted.
 */
export class SearchProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SearchProviderError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for the DuckDuckGo Instant Answer API.
 */
@Injectable()
export class SearchClient {
  private readonly logger = new Logger(SearchClient.name);

  constructor(@Inject(AGENT_CONFIG) private readonly config: AgentConfig) {}

  /**
   * Run one lookup. A single attempt; retries belong to the caller.
   *
   * @throws SearchProviderError on network, HTTP or JSON failures
   */
  async lookup(query: string): Promise<InstantAnswer> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      no_html: '1',
      no_redirect: '1',
      skip_disambig: '1',
    });

    let response: Response;
    try {
      response = await fetch(`${this.config.search.baseUrl}?${params}`, {
        signal: AbortSignal.timeout(this.config.search.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SearchProviderError(
        `Internet lookup failed (network/http): ${message}`,
      );
    }

    if (!response.ok) {
      throw new SearchProviderError(
        `Internet lookup failed (network/http): HTTP ${response.status}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.debug(`Unparseable search response: ${error}`);
      throw new SearchProviderError(
        'Internet lookup failed: response was not valid JSON.',
      );
    }

    if (!isRecord(body)) {
      throw new SearchProviderError(
        'Internet lookup failed: response was not valid JSON.',
      );
    }
    return body;
  }
}
