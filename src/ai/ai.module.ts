import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AGENT_CONFIG, AgentConfig, loadAgentConfig } from '../config/agent-config';
import { AgentService } from './agent.service';
import { AiController } from './ai.controller';
import { RetrievalHttpClient } from './clients/retrieval-http.client';
import { SearchClient } from './clients/search.client';
import { WeatherClient } from './clients/weather.client';
import { createToolCallingModel } from './completion/chat-model.factory';
import { COMPLETION_SERVICE } from './completion/completion.service';
import { LangChainCompletionService } from './completion/langchain-completion.service';
import { createLangChainTools } from './langchain-tools';
import { SYSTEM_PROMPT } from './prompts/system.prompt';
import {
  createTraceSink,
  TelemetryService,
  TRACE_SINK,
} from './telemetry/telemetry.service';
import { InternetSearchTool } from './tools/internet-search.tool';
import { RetrievalTool } from './tools/retrieval.tool';
import { ToolRegistry } from './tools/tool-registry';
import { WeatherTool } from './tools/weather.tool';

/**
 * Chat orchestration module.
 *
 * Components:
 * - AiController: HTTP endpoints for chat, streaming chat and status
 * - AgentService: planning loop over the completion service and tools
 * - ToolRegistry: weather, knowledge retrieval and internet search tools
 * - TelemetryService: per-request trace events
 *
 * Configuration is validated when the module is instantiated; an invalid
 * environment fails startup.
 */
@Module({
  imports: [ConfigModule],
  controllers: [AiController],
  providers: [
    {
      provide: AGENT_CONFIG,
      useFactory: loadAgentConfig,
      inject: [ConfigService],
    },
    {
      provide: TRACE_SINK,
      useFactory: createTraceSink,
      inject: [AGENT_CONFIG],
    },
    {
      provide: COMPLETION_SERVICE,
      useFactory: (config: AgentConfig, registry: ToolRegistry) =>
        new LangChainCompletionService(
          createToolCallingModel(config, createLangChainTools(registry)),
          SYSTEM_PROMPT,
        ),
      inject: [AGENT_CONFIG, ToolRegistry],
    },
    TelemetryService,
    WeatherClient,
    SearchClient,
    RetrievalHttpClient,
    WeatherTool,
    RetrievalTool,
    InternetSearchTool,
    ToolRegistry,
    AgentService,
  ],
  exports: [AGENT_CONFIG, AgentService, TelemetryService],
})
export class AiModule {}
