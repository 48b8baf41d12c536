import { APIResponseError } from '../errors';
import { NEWSAPI_ERROR_BODY, NEWSAPI_EVERYTHING } from '../test/fixtures';
import { FakeHandler, createFakeServer, json } from '../test/http';
import { NewsApiClient } from './newsapi-client';

function setup(handler: FakeHandler) {
  const server = createFakeServer(handler);
  const client = new NewsApiClient({ apiKey: 'test-key', timeout: 5000, adapter: server.adapter });
  return { client, requests: server.requests };
}

describe('NewsApiClient', () => {
  it('searches everything, newest first', async () => {
    const { client, requests } = setup(() => json(NEWSAPI_EVERYTHING));

    const articles = await client.searchEverything('ACME');

    expect(articles).toHaveLength(3);
    expect(requests[0].baseURL).toBe('https://newsapi.org/v2');
    expect(requests[0].url).toBe('/everything');
    expect(requests[0].timeout).toBe(5000);
    expect(requests[0].params).toEqual({
      apiKey: 'test-key',
      q: 'ACME',
      language: 'en',
      sortBy: 'publishedAt',
    });
  });

  it('passes pageSize through when given', async () => {
    const { client, requests } = setup(() => json(NEWSAPI_EVERYTHING));

    await client.searchEverything('ACME', { pageSize: 10, sortBy: 'relevancy' });

    expect(requests[0].params).toMatchObject({ pageSize: 10, sortBy: 'relevancy' });
  });

  it('raises a 502 for an error body sent with status 200', async () => {
    const { client } = setup(() => json(NEWSAPI_ERROR_BODY));

    const error = await client.searchEverything('ACME').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(APIResponseError);
    expect(error).toMatchObject({
      code: 'API_SERVER_ERROR',
      statusCode: 502,
      message: 'NewsAPI API error (502): Your API key is invalid or incorrect.',
    });
  });

  it('reads the message from non-2xx error bodies', async () => {
    const { client } = setup(() => json(NEWSAPI_ERROR_BODY, 401));

    await expect(client.searchEverything('ACME')).rejects.toMatchObject({
      code: 'API_UNAUTHORIZED',
      message: 'NewsAPI API error (401): Your API key is invalid or incorrect.',
    });
  });

  it('rejects a body whose articles are not a list', async () => {
    const { client } = setup(() => json({ status: 'ok', articles: 'none' }));

    await expect(client.searchEverything('ACME')).rejects.toMatchObject({
      code: 'API_SERVER_ERROR',
      message: 'NewsAPI API error (502): malformed response: "articles" is not a list',
    });
  });

  it('returns an empty list when articles are missing', async () => {
    const { client } = setup(() => json({ status: 'ok', totalResults: 0 }));

    await expect(client.searchEverything('ACME')).resolves.toEqual([]);
  });
});
