/**
 * Zod input schemas for the agent's tools.
 *
 * These are the single source of truth for argument validation in the
 * registry and for the JSON schemas advertised to the completion service.
 * Emptiness of `location` and `query` is checked by the executors so that
 * they can answer with their own sentinel strings.
 */
import { z } from 'zod';

export const TOOL_NAMES = {
  WEATHER: 'weather_query',
  RETRIEVAL: 'retrieve_weather_activity_clothing_info',
  SEARCH: 'internet_search',
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export const MAX_RELATED_LIMIT = 20;
export const DEFAULT_MAX_RELATED = 6;

export const WeatherQuerySchema = z.object({
  location: z
    .string()
    .describe(
      'City and/or country to look up, e.g. "Cairo, EG". Never guess a location the user did not give.',
    ),
});

export const RetrievalQuerySchema = z.object({
  query: z
    .string()
    .describe(
      'Short natural language query about suitable activities or clothing for given weather conditions.',
    ),
});

export const InternetSearchSchema = z.object({
  query: z.string().describe('Search query for general world knowledge'),
  max_related: z
    .number()
    .int()
    .min(0)
    .max(MAX_RELATED_LIMIT)
    .default(DEFAULT_MAX_RELATED)
    .describe(`Maximum number of related topics to list (0-${MAX_RELATED_LIMIT})`),
});

export type WeatherQueryArgs = z.infer<typeof WeatherQuerySchema>;
export type RetrievalQueryArgs = z.infer<typeof RetrievalQuerySchema>;
export type InternetSearchArgs = z.infer<typeof InternetSearchSchema>;

export interface ToolArgsMap {
  weather_query: WeatherQueryArgs;
  retrieve_weather_activity_clothing_info: RetrievalQueryArgs;
  internet_search: InternetSearchArgs;
}

export const TOOL_DESCRIPTIONS: Readonly<Record<ToolName, string>> = {
  weather_query:
    'Get the current weather report for a location. Only call this when the user named a location.',
  retrieve_weather_activity_clothing_info:
    'Search the knowledge base for activity and clothing recommendations matching weather conditions.',
  internet_search:
    'Look up general world knowledge unrelated to weather, activities or clothing. Returns a short summary with sources.',
};

export function isToolName(name: string): name is ToolName {
  return Object.values(TOOL_NAMES).some((known) => known === name);
}
