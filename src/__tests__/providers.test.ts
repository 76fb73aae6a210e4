import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaProvider } from '../llm/providers/ollama.js';
import { HttpClient } from '../utils/http-client.js';

function stubChat() {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) =>
        new Response(
            JSON.stringify({ model: 'llama3', message: { content: '{"ok":true}' }, prompt_eval_count: 12, eval_count: 4 }),
            { status: 200, headers: { 'content-type': 'application/json' } }
        )
    );
    vi.stubGlobal('fetch', fetch);
    return fetch;
}

function ollama(): OllamaProvider {
    const provider = new OllamaProvider({ model: 'llama3', baseUrl: 'http://ollama.test/' });
    provider.setHttpClient(new HttpClient());
    return provider;
}

describe('OllamaProvider', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should request JSON output per call through the format field', async () => {
        const fetch = stubChat();
        const result = await ollama().complete('Screen this paper', { jsonMode: true, systemPrompt: 'You screen papers' });

        expect(fetch.mock.calls[0]?.[0]).toBe('http://ollama.test/api/chat');
        const body: unknown = JSON.parse(String(fetch.mock.calls[0]?.[1].body));
        expect(body).toMatchObject({
            model: 'llama3',
            stream: false,
            format: 'json',
            messages: [
                { role: 'system', content: 'You screen papers' },
                { role: 'user', content: 'Screen this paper' },
            ],
        });
        expect(result).toEqual({
            text: '{"ok":true}',
            usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 },
            model: 'llama3',
            provider: 'ollama',
        });
    });

    it('should leave the format out of plain-text calls', async () => {
        const fetch = stubChat();
        await ollama().complete('Write the introduction');

        const body: unknown = JSON.parse(String(fetch.mock.calls[0]?.[1].body));
        expect(body).not.toHaveProperty('format');
        expect(body).toMatchObject({ messages: [{ role: 'user', content: 'Write the introduction' }] });
    });
});
