/**
 * Unit tests for search.client.ts
 */
import { SearchClient, SearchProviderError } from './search.client';
import { createTestConfig } from '../test-utils/test-config';

const mockFetch = jest.fn();
global.fetch = mockFetch;

describe('SearchClient', () => {
  let client: SearchClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new SearchClient(createTestConfig());
  });

  it('should call the instant answer endpoint with the fixed parameters', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.resolve({ Heading: 'Quantum computing' }),
    });

    const result = await client.lookup('quantum computing');

    expect(result).toEqual({ Heading: 'Quantum computing' });
    expect(mockFetch).toHaveBeenCalledWith(
      'http://search.test/?q=quantum+computing&format=json&no_html=1&no_redirect=1&skip_disambig=1',
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('should wrap network failures', async () => {
    mockFetch.mockRejectedValueOnce(new Error('socket hang up'));

    const lookup = client.lookup('anything');

    await expect(lookup).rejects.toBeInstanceOf(SearchProviderError);
    await expect(lookup).rejects.toThrow(
      'Internet lookup failed (network/http): socket hang up',
    );
  });

  it('should report non-2xx statuses', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 503,
      json: () => Promise.resolve({}),
    });

    await expect(client.lookup('anything')).rejects.toThrow(
      'Internet lookup failed (network/http): HTTP 503',
    );
  });

  it('should report bodies that are not JSON', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.reject(new SyntaxError('Unexpected token <')),
    });

    await expect(client.lookup('anything')).rejects.toThrow(
      'Internet lookup failed: response was not valid JSON.',
    );
  });

  it('should reject JSON that is not an object', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.resolve(['not', 'an', 'object']),
    });

    await expect(client.lookup('anything')).rejects.toThrow(
      'Internet lookup failed: response was not valid JSON.',
    );
  });
});
