import { describe, it, expect, vi, afterEach } from 'vitest';
import crossFetch from 'cross-fetch';
import { openaiChat, openaiEmbed, OpenAIError } from './openaiClient.js';

// Mock cross-fetch before use
vi.mock('cross-fetch', () => ({
  default: vi.fn(),
}));

const fetchMock = vi.mocked(crossFetch);
const conn = { apiKey: 'test-key', baseUrl: 'https://api.openai.com/v1' };

const jsonResponse = (body: unknown) =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });

describe('openaiClient', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('openaiChat', () => {
    it('throws when no API key is configured', async () => {
      await expect(openaiChat({ baseUrl: conn.baseUrl }, [{ role: 'user', content: 'Hello' }], { model: 'gpt-4o-mini' }))
        .rejects.toThrow('OPENAI_API_KEY is not set');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('returns the trimmed assistant reply', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { role: 'assistant', content: '  Hello back!\n' } }] }));

      const result = await openaiChat(conn, [{ role: 'user', content: 'Hello' }], { model: 'gpt-4o-mini' });

      expect(result.content).toBe('Hello back!');
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.openai.com/v1/chat/completions',
        expect.objectContaining({
          method: 'POST',
          headers: expect.objectContaining({ 'Authorization': 'Bearer test-key' }),
        }),
      );
    });

    it('sends the requested model and temperature', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));

      await openaiChat(conn, [{ role: 'user', content: 'Hi' }], { model: 'gpt-4o', temperature: 0.7 });

      const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
      expect(body).toMatchObject({ model: 'gpt-4o', temperature: 0.7, messages: [{ role: 'user', content: 'Hi' }] });
    });

    it('forces temperature=1 for o3 models', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));

      await openaiChat(conn, [{ role: 'user', content: 'Hi' }], { model: 'o3-mini', temperature: 0 });

      expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).temperature).toBe(1);
    });

    it('handles API error responses', async () => {
      fetchMock.mockResolvedValueOnce(new Response('Rate limited', { status: 429, statusText: 'Too Many Requests' }));

      const err = await openaiChat(conn, [{ role: 'user', content: 'Hi' }], { model: 'gpt-4o-mini' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(OpenAIError);
      expect(err).toMatchObject({ status: 429, message: 'OpenAI error: 429 Too Many Requests Rate limited' });
    });

    it('rejects a response without choices', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [] }));
      await expect(openaiChat(conn, [{ role: 'user', content: 'Hi' }], { model: 'gpt-4o-mini' }))
        .rejects.toThrow('OpenAI chat error: malformed response');
    });
  });

  describe('openaiEmbed', () => {
    it('returns the first embedding', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ embedding: [0.25, -0.5] }] }));
      expect(await openaiEmbed(conn, 'droid', { model: 'text-embedding-3-small' })).toEqual([0.25, -0.5]);
    });

    it('rejects non-numeric embeddings', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ embedding: ['x'] }] }));
      await expect(openaiEmbed(conn, 'droid', { model: 'm' })).rejects.toThrow('OpenAI embeddings error: malformed response');
    });
  });
});
