import { Inject, Injectable } from '@nestjs/common';
import { AGENT_CONFIG, AgentConfig } from '../../config/agent-config';
import { Passage, RetrievalHttpClient } from '../clients/retrieval-http.client';
import { extractRetrievalCitations } from '../sources/source-extractor';
import { errorOutput, textOutput, ToolOutput } from '../types/conversation';
import { AgentTool } from './agent-tool';
import {
  RetrievalQueryArgs,
  RetrievalQuerySchema,
  TOOL_NAMES,
} from './tool-schemas';

export const NO_PASSAGES_SENTINEL =
  'No relevant passages found in the knowledge base.';

/**
 * Join passages into one block: whitespace collapsed, blank line between.
 */
export function renderPassages(passages: readonly Passage[]): string {
  return passages
    .map((p) => p.content.replace(/\s+/g, ' ').trim())
    .filter((content) => content.length > 0)
    .join('\n\n');
}

@Injectable()
export class RetrievalTool implements AgentTool<RetrievalQueryArgs> {
  readonly name = TOOL_NAMES.RETRIEVAL;
  readonly schema = RetrievalQuerySchema;
  readonly timingStep = 'retrieve';

  constructor(
    private readonly client: RetrievalHttpClient,
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
  ) {}

  async execute({ query }: RetrievalQueryArgs): Promise<ToolOutput> {
    const cleaned = query.trim();
    if (!cleaned) {
      return errorOutput('Error: empty query.');
    }

    const passages = await this.client.retrieve(
      cleaned,
      this.config.retrieval.topN,
    );
    const text = renderPassages(passages);
    if (!text) {
      return textOutput(NO_PASSAGES_SENTINEL);
    }

    return textOutput(
      text,
      extractRetrievalCitations(passages, this.config.sources.retrievalCap),
    );
  }
}
