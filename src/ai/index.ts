export { AiModule } from './ai.module';
export { AgentService } from './agent.service';
export { AiController } from './ai.controller';
export { ToolRegistry } from './tools/tool-registry';
export { TelemetryService } from './telemetry/telemetry.service';
export * from './dto/chat-request.dto';
export * from './dto/chat-response.dto';
export * from './types/agent-events';
export * from './types/conversation';
export * from './utils/reasoning';
