import { Injectable, Logger } from '@nestjs/common';
import { WeatherClient } from '../clients/weather.client';
import { errorOutput, textOutput, ToolOutput } from '../types/conversation';
import { AgentTool } from './agent-tool';
import { TOOL_NAMES, WeatherQueryArgs, WeatherQuerySchema } from './tool-schemas';

/**
 * Placeholder values that never identify a real place.
 */
export const BAD_LOCATIONS: ReadonlySet<string> = new Set([
  '',
  '?',
  'unknown',
  'n/a',
  'na',
  'none',
  'null',
]);

export const INVALID_LOCATION_SENTINEL =
  'ERROR: invalid location. Ask the user: Which location (country/city)?';

@Injectable()
export class WeatherTool implements AgentTool<WeatherQueryArgs> {
  private readonly logger = new Logger(WeatherTool.name);
  readonly name = TOOL_NAMES.WEATHER;
  readonly schema = WeatherQuerySchema;
  readonly timingStep = TOOL_NAMES.WEATHER;

  constructor(private readonly client: WeatherClient) {}

  async execute({ location }: WeatherQueryArgs): Promise<ToolOutput> {
    const cleaned = location.trim();
    if (BAD_LOCATIONS.has(cleaned.toLowerCase())) {
      this.logger.warn(`Rejected placeholder location "${location}"`);
      return errorOutput(INVALID_LOCATION_SENTINEL);
    }
    return textOutput(await this.client.report(cleaned));
  }
}
