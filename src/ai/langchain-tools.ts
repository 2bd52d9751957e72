import { StructuredToolInterface, tool } from '@langchain/core/tools';
import { ToolRegistry } from './tools/tool-registry';
import {
  InternetSearchSchema,
  RetrievalQuerySchema,
  TOOL_DESCRIPTIONS,
  TOOL_NAMES,
  ToolName,
  WeatherQuerySchema,
} from './tools/tool-schemas';

/**
 * Create LangChain tool definitions for binding to the chat model.
 *
 * The planning loop dispatches tool calls itself through the registry;
 * these definitions advertise names, descriptions and argument schemas to
 * the model. Invoking one directly also routes through the registry so
 * validation and error sentinels stay identical.
 *
 * @param registry - Dispatch table the tools delegate to
 */
export function createLangChainTools(
  registry: ToolRegistry,
): StructuredToolInterface[] {
  const run = async (
    name: ToolName,
    args: Record<string, unknown>,
  ): Promise<string> => {
    const result = await registry.dispatch({ id: `${name}_direct`, name, args });
    return result.text;
  };

  return [
    tool(async (args) => run(TOOL_NAMES.WEATHER, args), {
      name: TOOL_NAMES.WEATHER,
      description: TOOL_DESCRIPTIONS.weather_query,
      schema: WeatherQuerySchema,
    }),

    tool(async (args) => run(TOOL_NAMES.RETRIEVAL, args), {
      name: TOOL_NAMES.RETRIEVAL,
      description: TOOL_DESCRIPTIONS.retrieve_weather_activity_clothing_info,
      schema: RetrievalQuerySchema,
    }),

    tool(async (args) => run(TOOL_NAMES.SEARCH, args), {
      name: TOOL_NAMES.SEARCH,
      description: TOOL_DESCRIPTIONS.internet_search,
      schema: InternetSearchSchema,
    }),
  ];
}
