import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AGENT_CONFIG, AgentConfig } from '../../config/agent-config';

const PassageSchema = z.object({
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export type Passage = z.infer<typeof PassageSchema>;

/**
 * Envelope returned by the retrieval service.
 */
const RetrieveResponseSchema = z.object({
  success: z.boolean(),
  result: z.array(PassageSchema).optional(),
  error: z.string().optional(),
});

/**
 * HTTP client for the external knowledge retrieval service.
 *
 * The vector store, embeddings and reranking live behind
 * `POST /api/retrieve`; each call is an independent stateless request.
 */
@Injectable()
export class RetrievalHttpClient {
  private readonly logger = new Logger(RetrievalHttpClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(@Inject(AGENT_CONFIG) config: AgentConfig) {
    this.timeoutMs = config.retrieval.timeoutMs;
    this.baseUrl = config.retrieval.baseUrl.replace(/\/+$/, '');
    this.logger.log(
      `RetrievalHttpClient configured with base URL: ${this.baseUrl}`,
    );
  }

  /**
   * Retrieve the top passages for a query.
   *
   * @throws Error if the service is unreachable or reports a failure
   */
  async retrieve(query: string, topN: number): Promise<Passage[]> {
    const url = `${this.baseUrl}/api/retrieve`;

    this.logger.debug(`Retrieving top ${topN} passages for: ${query}`);

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ query, top_n: topN }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const parsed = RetrieveResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Retrieval service returned an unexpected payload');
    }

    const data = parsed.data;
    if (!response.ok || !data.success) {
      const errorMsg =
        data.error || `Retrieval failed with status ${response.status}`;
      this.logger.error(`Retrieval failed: ${errorMsg}`);
      throw new Error(errorMsg);
    }

    this.logger.debug(`Retrieved ${data.result?.length ?? 0} passages`);
    return data.result ?? [];
  }
}
