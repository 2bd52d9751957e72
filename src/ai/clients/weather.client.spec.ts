/**
 * Unit tests for weather.client.ts
 */
import { renderWeatherReport, WeatherClient } from './weather.client';
import { createTestConfig } from '../test-utils/test-config';

const mockFetch = jest.fn();
global.fetch = mockFetch;

const CAIRO_PAYLOAD = {
  name: 'Cairo',
  weather: [{ description: 'clear sky' }],
  wind: { speed: 3.6, deg: 40 },
  main: {
    temp: 31.2,
    temp_max: 32,
    temp_min: 30,
    feels_like: 30.1,
    humidity: 20,
  },
  clouds: { all: 0 },
};

describe('renderWeatherReport', () => {
  it('should render every field in fixed order', () => {
    expect(renderWeatherReport('cairo', CAIRO_PAYLOAD)).toBe(
      [
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
      ].join('\n'),
    );
  });

  it('should fall back to the requested location and n/a values', () => {
    const report = renderWeatherReport('Atlantis', {
      weather: [],
      wind: {},
      main: {},
      rain: { '1h': 0.4 },
    });

    expect(report.split('\n')).toEqual([
      'In Atlantis, the current weather is as follows:',
      'Detailed status: n/a',
      'Wind speed: n/a, direction: n/a',
      'Humidity: n/a',
      'Temperature:',
      '  - Current: n/a',
      '  - High: n/a',
      '  - Low: n/a',
      '  - Feels like: n/a',
      'Rain: 0.4 mm',
      'Cloud cover: n/a',
    ]);
  });
});

describe('WeatherClient', () => {
  let client: WeatherClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new WeatherClient(
      createTestConfig({
        weather: { baseUrl: 'http://weather.test/data/2.5/' },
      }),
    );
  });

  it('should query the current weather endpoint in metric units', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.resolve(CAIRO_PAYLOAD),
    });

    await client.report('Cairo, EG');

    expect(mockFetch).toHaveBeenCalledWith(
      'http://weather.test/data/2.5/weather?q=Cairo%2C+EG&appid=test-secret&units=metric',
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('should return the rendered report', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.resolve(CAIRO_PAYLOAD),
    });

    const report = await client.report('Cairo');

    expect(report.split('\n')[0]).toBe(
      'In Cairo, the current weather is as follows:',
    );
    expect(report).toContain('  - Current: 31.2°C');
  });

  it('should throw with the provider message on non-2xx responses', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 404,
      statusText: 'Not Found',
      json: () => Promise.resolve({ cod: '404', message: 'city not found' }),
    });

    await expect(client.report('Nowhere')).rejects.toThrow(
      'Weather provider error (404): city not found',
    );
  });

  it('should propagate network failures', async () => {
    mockFetch.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    await expect(client.report('Cairo')).rejects.toThrow(
      'connect ECONNREFUSED',
    );
  });
});
