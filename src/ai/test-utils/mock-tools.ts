/**
 * Provider fixtures and a tool harness for unit testing.
 *
 * The harness wires the real tools and registry over real clients whose
 * network methods are replaced with Jest spies, so tests exercise
 * validation, sentinels and citation extraction without network calls.
 */
import { AgentConfig } from '../../config/agent-config';
import { Passage, RetrievalHttpClient } from '../clients/retrieval-http.client';
import { InstantAnswer, SearchClient } from '../clients/search.client';
import { WeatherClient } from '../clients/weather.client';
import { InternetSearchTool } from '../tools/internet-search.tool';
import { RetrievalTool } from '../tools/retrieval.tool';
import { ToolRegistry } from '../tools/tool-registry';
import { WeatherTool } from '../tools/weather.tool';
import { createTestConfig } from './test-config';

export const MOCK_WEATHER_REPORT = [
  'In Cairo, the current weather is as follows:',
  'Detailed status: clear sky',
  'Wind speed: 3.6 m/s, direction: 40°',
  'Humidity: 20%',
  'Temperature:',
  '  - Current: 31.2°C',
  '  - High: 32°C',
  '  - Low: 30°C',
  '  - Feels like: 30.1°C',
  'Rain: {}',
  'Cloud cover: 0%',
].join('\n');

export const MOCK_PASSAGES: Passage[] = [
  {
    content: 'Hot and sunny days call for breathable linen and a wide hat.',
    metadata: { source: 'https://kb.test/hot-weather', title: 'Hot weather' },
  },
  {
    content: 'Early morning walks avoid the midday heat.',
    metadata: { source: 'https://kb.test/walks', title: 'Walking' },
  },
  {
    content: 'Sunscreen is essential under a clear sky.',
    metadata: { source: 'https://kb.test/sun', title: 'Sun care' },
  },
];

export const MOCK_QUANTUM_ANSWER: InstantAnswer = {
  Heading: 'Quantum computing',
  AbstractText:
    'Quantum computing uses quantum mechanical phenomena to perform computation.',
  AbstractURL: 'https://example.com/wiki/Quantum_computing',
  RelatedTopics: [],
};

export interface ToolHarness {
  config: AgentConfig;
  registry: ToolRegistry;
  weatherReport: jest.SpyInstance<Promise<string>, [string]>;
  searchLookup: jest.SpyInstance<Promise<InstantAnswer>, [string]>;
  retrieve: jest.SpyInstance<Promise<Passage[]>, [string, number]>;
}

/**
 * Build the real registry over stubbed provider clients. Defaults: the
 * Cairo weather report, the three fixture passages and an empty search
 * answer.
 */
export function createToolHarness(
  config: AgentConfig = createTestConfig(),
): ToolHarness {
  const weatherClient = new WeatherClient(config);
  const searchClient = new SearchClient(config);
  const retrievalClient = new RetrievalHttpClient(config);

  const weatherReport = jest
    .spyOn(weatherClient, 'report')
    .mockResolvedValue(MOCK_WEATHER_REPORT);
  const searchLookup = jest
    .spyOn(searchClient, 'lookup')
    .mockResolvedValue({});
  const retrieve = jest
    .spyOn(retrievalClient, 'retrieve')
    .mockResolvedValue(MOCK_PASSAGES);

  const registry = new ToolRegistry(
    new WeatherTool(weatherClient),
    new RetrievalTool(retrievalClient, config),
    new InternetSearchTool(searchClient, config),
  );

  return { config, registry, weatherReport, searchLookup, retrieve };
}
