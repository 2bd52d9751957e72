import { Injectable, Logger } from '@nestjs/common';
import { errorOutput, ToolCallRequest, ToolOutput, ToolResult } from '../types/conversation';
import { AgentTool } from './agent-tool';
import { InternetSearchTool } from './internet-search.tool';
import { RetrievalTool } from './retrieval.tool';
import { isToolName, ToolArgsMap, ToolName } from './tool-schemas';
import { WeatherTool } from './weather.tool';

type ToolTable = { readonly [K in ToolName]: AgentTool<ToolArgsMap[K]> };

/**
 * Static dispatch table for the agent's tools.
 *
 * Validates arguments against each tool's schema and converts every
 * failure (unknown tool, invalid arguments, thrown error) into an error
 * sentinel ToolResult. `dispatch` never rejects.
 */
@Injectable()
export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);
  private readonly table: ToolTable;

  constructor(
    weatherTool: WeatherTool,
    retrievalTool: RetrievalTool,
    internetSearchTool: InternetSearchTool,
  ) {
    this.table = {
      weather_query: weatherTool,
      retrieve_weather_activity_clothing_info: retrievalTool,
      internet_search: internetSearchTool,
    };
  }

  get toolNames(): ToolName[] {
    return Object.values(this.table).map((tool) => tool.name);
  }

  /**
   * Latency breakdown key for a tool, or the raw name for unknown tools.
   */
  timingStep(name: string): string {
    return isToolName(name) ? this.table[name].timingStep : name;
  }

  async dispatch(call: ToolCallRequest): Promise<ToolResult> {
    if (!isToolName(call.name)) {
      this.logger.warn(`Completion requested unknown tool "${call.name}"`);
      return this.toResult(call, errorOutput(`ERROR: unknown tool "${call.name}".`));
    }
    if (call.rawArgs !== undefined) {
      this.logger.warn(`Unparseable arguments for ${call.name}: ${call.rawArgs}`);
      return this.toResult(
        call,
        errorOutput(
          `ERROR: invalid arguments for ${call.name}: not valid JSON: ${call.rawArgs}`,
        ),
      );
    }
    return this.toResult(call, await this.invoke(call.name, call.args));
  }

  private async invoke<K extends ToolName>(
    name: K,
    args: ToolCallRequest['args'],
  ): Promise<ToolOutput> {
    const tool: AgentTool<ToolArgsMap[K]> = this.table[name];

    const parsed = tool.schema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`)
        .join('; ');
      this.logger.warn(`Invalid arguments for ${name}: ${issues}`);
      return errorOutput(`ERROR: invalid arguments for ${name}: ${issues}`);
    }

    try {
      return await tool.execute(parsed.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Tool ${name} failed: ${message}`);
      return errorOutput(`ERROR: ${name} failed: ${message}`);
    }
  }

  private toResult(call: ToolCallRequest, output: ToolOutput): ToolResult {
    return { ...output, toolCallId: call.id, toolName: call.name };
  }
}
