import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from '../../../src/config';
import { ChatCompletionGenerator, createTextGenerator, extractCompletion } from '../../../src/llm/text-generator';
import { fetchReturning } from '../../helpers';

const completion = (content: unknown) => ({ choices: [{ message: { role: 'assistant', content } }] });

function generator(status: number, body: unknown) {
  const fetchFn = fetchReturning(status, body);
  return {
    fetchFn,
    client: new ChatCompletionGenerator('OpenAI', 'https://llm.test/v1/chat/completions', 'test-secret', 'test-model', fetchFn),
  };
}

describe('extractCompletion', () => {
  it('reads the first choice and trims it', () => {
    expect(extractCompletion(completion('  I enjoy backend work.\n'))).toBe('I enjoy backend work.');
  });

  it('returns null for anything else', () => {
    expect(extractCompletion(null)).toBeNull();
    expect(extractCompletion({ choices: [] })).toBeNull();
    expect(extractCompletion({ choices: [{ text: 'legacy' }] })).toBeNull();
    expect(extractCompletion(completion(42))).toBeNull();
  });
});

describe('ChatCompletionGenerator', () => {
  it('sends a chat request and returns the answer', async () => {
    const { client, fetchFn } = generator(200, completion('Because of the team.'));

    expect(await client.generate('Why Acme?', 200, 0.3)).toBe('Because of the team.');

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'Authorization': 'Bearer test-secret' });
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'test-model', max_tokens: 200, temperature: 0.3, stream: false });
    expect(body.messages[1]).toEqual({ role: 'user', content: 'Why Acme?' });
  });

  it('gives up quietly when rate limited', async () => {
    const { client } = generator(429, 'slow down');
    expect(await client.generate('Why Acme?', 200, 0.3)).toBeNull();
  });

  it('throws on other error statuses', async () => {
    const { client } = generator(500, 'upstream failure');
    await expect(client.generate('Why Acme?', 200, 0.3)).rejects.toThrow('OpenAI API error: 500 - upstream failure');
  });

  it('returns null for an empty completion', async () => {
    const { client } = generator(200, completion('   '));
    expect(await client.generate('Why Acme?', 200, 0.3)).toBeNull();
  });
});

describe('createTextGenerator', () => {
  it('needs an API key for the configured provider', () => {
    const noKeys = { openaiApiKey: null, huggingfaceApiKey: null };
    expect(createTextGenerator(DEFAULT_SETTINGS.llm, noKeys)).toBeNull();
    expect(
      createTextGenerator({ ...DEFAULT_SETTINGS.llm, provider: 'huggingface' }, { ...noKeys, openaiApiKey: 'test-secret' })
    ).toBeNull();
  });

  it('points each provider at its endpoint', async () => {
    const fetchFn = fetchReturning(200, completion('ok'));
    const keys = { openaiApiKey: 'test-secret', huggingfaceApiKey: 'test-secret' };

    await createTextGenerator(DEFAULT_SETTINGS.llm, keys, fetchFn)?.generate('q', 10, 0);
    await createTextGenerator({ ...DEFAULT_SETTINGS.llm, provider: 'huggingface' }, keys, fetchFn)?.generate('q', 10, 0);

    expect(fetchFn.mock.calls.map(call => call[0])).toEqual([
      'https://api.openai.com/v1/chat/completions',
      'https://router.huggingface.co/v1/chat/completions',
    ]);
  });
});
