/**
 * Unit tests for latency-timer.ts
 */
import { performance } from 'node:perf_hooks';
import { LatencyTimer } from './latency-timer';

describe('LatencyTimer', () => {
  let now: number;
  let nowSpy: jest.SpyInstance<number, []>;

  beforeEach(() => {
    now = 1000;
    nowSpy = jest.spyOn(performance, 'now').mockImplementation(() => now);
  });

  afterEach(() => {
    nowSpy.mockRestore();
  });

  it('should always report the retrieve and llm steps', () => {
    const timer = new LatencyTimer();
    now = 1012.7;

    expect(timer.breakdown()).toEqual({
      total: 12,
      by_step: { retrieve: 0, llm: 0 },
    });
  });

  it('should accumulate repeated steps and floor values', () => {
    const timer = new LatencyTimer();
    timer.record('llm', 40.6);
    timer.record('llm', 30.6);
    timer.record('weather_query', 9.9);
    now = 1100;

    expect(timer.breakdown()).toEqual({
      total: 100,
      by_step: { retrieve: 0, llm: 71, weather_query: 9 },
    });
  });

  it('should clamp steps so their sum never exceeds the total', () => {
    const timer = new LatencyTimer();
    timer.record('llm', 80);
    timer.record('retrieve', 50);
    now = 1100;

    const { total, by_step } = timer.breakdown();

    expect(by_step).toEqual({ retrieve: 20, llm: 80 });
    expect(by_step.retrieve + by_step.llm).toBeLessThanOrEqual(total);
  });
});
