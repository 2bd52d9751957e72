import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AGENT_CONFIG, AgentConfig } from '../../config/agent-config';

const OptionalNumber = z.number().optional();

/**
 * Subset of the OpenWeatherMap current-weather payload used in reports.
 */
const CurrentWeatherSchema = z.object({
  name: z.string().optional(),
  weather: z.array(z.object({ description: z.string() })).default([]),
  wind: z
    .object({ speed: OptionalNumber, deg: OptionalNumber })
    .default({}),
  main: z
    .object({
      temp: OptionalNumber,
      temp_max: OptionalNumber,
      temp_min: OptionalNumber,
      feels_like: OptionalNumber,
      humidity: OptionalNumber,
    })
    .default({}),
  rain: z.record(z.number()).optional(),
  clouds: z.object({ all: OptionalNumber }).optional(),
});

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;

const ErrorBodySchema = z.object({ message: z.string() });

function value(n: number | undefined, unit = ''): string {
  return n === undefined ? 'n/a' : `${n}${unit}`;
}

/**
 * Render the provider payload as the plain-text report handed to the
 * completion service.
 */
export function renderWeatherReport(
  location: string,
  weather: CurrentWeather,
): string {
  const status = weather.weather.map((w) => w.description).join(', ');
  const rainLastHour = weather.rain?.['1h'];

  return [
    `In ${weather.name || location}, the current weather is as follows:`,
    `Detailed status: ${status || 'n/a'}`,
    `Wind speed: ${value(weather.wind.speed, ' m/s')}, direction: ${value(weather.wind.deg, '°')}`,
    `Humidity: ${value(weather.main.humidity, '%')}`,
    'Temperature:',
    `  - Current: ${value(weather.main.temp, '°C')}`,
    `  - High: ${value(weather.main.temp_max, '°C')}`,
    `  - Low: ${value(weather.main.temp_min, '°C')}`,
    `  - Feels like: ${value(weather.main.feels_like, '°C')}`,
    `Rain: ${rainLastHour === undefined ? '{}' : `${rainLastHour} mm`}`,
    `Cloud cover: ${value(weather.clouds?.all, '%')}`,
  ].join('\n');
}

/**
 * HTTP client for the OpenWeatherMap current-weather endpoint.
 */
@Injectable()
export class WeatherClient {
  private readonly logger = new Logger(WeatherClient.name);
  private readonly baseUrl: string;

  constructor(@Inject(AGENT_CONFIG) private readonly config: AgentConfig) {
    this.baseUrl = config.weather.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Fetch the current weather for `location` and render it as text.
   *
   * @throws Error when the provider is unreachable or answers with a non-2xx status
   */
  async report(location: string): Promise<string> {
    const params = new URLSearchParams({
      q: location,
      appid: this.config.weather.apiKey,
      units: 'metric',
    });

    this.logger.debug(`Fetching current weather for "${location}"`);

    const response = await fetch(`${this.baseUrl}/weather?${params}`, {
      signal: AbortSignal.timeout(this.config.weather.timeoutMs),
    });
    const body: unknown = await response.json();

    if (!response.ok) {
      const error = ErrorBodySchema.safeParse(body);
      const reason = error.success ? error.data.message : response.statusText;
      throw new Error(`Weather provider error (${response.status}): ${reason}`);
    }

    const parsed = CurrentWeatherSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Weather provider returned an unexpected payload');
    }
    return renderWeatherReport(location, parsed.data);
  }
}
