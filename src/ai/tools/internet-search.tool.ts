import { Inject, Injectable, Logger } from '@nestjs/common';
import { AGENT_CONFIG, AgentConfig } from '../../config/agent-config';
import { InstantAnswer, SearchClient } from '../clients/search.client';
import { parseSearchCitations } from '../sources/source-extractor';
import { errorOutput, textOutput, ToolOutput } from '../types/conversation';
import { PermitPool } from '../utils/permit-pool';
import { AgentTool } from './agent-tool';
import {
  InternetSearchArgs,
  InternetSearchSchema,
  TOOL_NAMES,
} from './tool-schemas';

export const NO_SEARCH_RESULT =
  'No instant-answer content found for this query. Try a more specific query.';

interface RelatedTopic {
  text: string;
  url: string;
}

type LookupOutcome =
  | { ok: true; answer: InstantAnswer }
  | { ok: false; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(data: Readonly<Record<string, unknown>>, key: string): string {
  const value = data[key];
  return typeof value === 'string' ? value.replace(/\s+/g, ' ').trim() : '';
}

function flattenRelated(
  topics: unknown,
  limit: number,
  out: RelatedTopic[] = [],
): RelatedTopic[] {
  if (!Array.isArray(topics)) {
    return out;
  }
  for (const topic of topics) {
    if (out.length >= limit) {
      break;
    }
    if (!isRecord(topic)) {
      continue;
    }
    if (Array.isArray(topic.Topics)) {
      flattenRelated(topic.Topics, limit, out);
      continue;
    }
    const text = field(topic, 'Text');
    if (text) {
      out.push({ text, url: field(topic, 'FirstURL') });
    }
  }
  return out;
}

/**
 * Normalize an Instant Answer payload into the fixed-order summary:
 * Title, Answer, Definition, Abstract, Source, then Related bullets.
 * Returns NO_SEARCH_RESULT when nothing beyond the title was found.
 */
export function formatInstantAnswer(
  data: InstantAnswer,
  query: string,
  maxRelated: number,
): string {
  const lines = [`Title: ${field(data, 'Heading') || query}`];

  const answer = field(data, 'Answer');
  if (answer) {
    lines.push(`Answer: ${answer}`);
  }
  const definition = field(data, 'Definition');
  if (definition) {
    lines.push(`Definition: ${definition}`);
  }
  const abstract = field(data, 'AbstractText') || field(data, 'Abstract');
  if (abstract) {
    lines.push(`Abstract: ${abstract}`);
  }
  const source = field(data, 'AbstractURL');
  if (source) {
    lines.push(`Source: ${source}`);
  }

  const related = flattenRelated(data.RelatedTopics, maxRelated);
  if (related.length > 0) {
    lines.push('Related:');
    for (const topic of related) {
      lines.push(topic.url ? `- ${topic.text} (${topic.url})` : `- ${topic.text}`);
    }
  }

  return lines.length > 1 ? lines.join('\n') : NO_SEARCH_RESULT;
}

/**
 * General-knowledge lookup against the Instant Answer API.
 *
 * Lookups share one process-wide permit pool; a permit is held across all
 * retry attempts of a single call.
 */
@Injectable()
export class InternetSearchTool implements AgentTool<InternetSearchArgs> {
  private readonly logger = new Logger(InternetSearchTool.name);
  private readonly permits: PermitPool;
  readonly name = TOOL_NAMES.SEARCH;
  readonly schema = InternetSearchSchema;
  readonly timingStep = TOOL_NAMES.SEARCH;

  constructor(
    private readonly client: SearchClient,
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
  ) {
    this.permits = new PermitPool(config.search.maxConcurrency);
  }

  async execute({
    query,
    max_related,
  }: InternetSearchArgs): Promise<ToolOutput> {
    const cleaned = query.trim();
    if (!cleaned) {
      return errorOutput('Error: empty query.');
    }

    const outcome = await this.permits.run(() => this.lookupWithRetry(cleaned));
    if (!outcome.ok) {
      return errorOutput(outcome.message);
    }

    const text = formatInstantAnswer(outcome.answer, cleaned, max_related);
    return textOutput(text, parseSearchCitations(text));
  }

  private async lookupWithRetry(query: string): Promise<LookupOutcome> {
    const { maxAttempts, retryBaseMs } = this.config.search;
    let delay = retryBaseMs;
    let lastError = 'Internet lookup failed.';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return { ok: true, answer: await this.client.lookup(query) };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Search attempt ${attempt}/${maxAttempts} failed: ${lastError}`,
        );
      }

      if (attempt < maxAttempts) {
        await this.sleep(delay);
        delay *= 2;
      }
    }

    return { ok: false, message: lastError };
  }

  /**
   * Sleep helper for retry delays.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
