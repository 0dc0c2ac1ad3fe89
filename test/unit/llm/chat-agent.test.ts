import { ChatAgent } from '../../../src/llm/chat-agent.js';
import type { ChatClient, ChatMessage } from '../../../src/llm/types.js';

class FakeClient implements ChatClient {
  readonly calls: ChatMessage[][] = [];
  constructor(private readonly replies: Array<string | Error>) {}

  async complete(messages: readonly ChatMessage[]): Promise<string> {
    this.calls.push([...messages]);
    const next = this.replies.shift() ?? '';
    if (next instanceof Error) throw next;
    return next;
  }
}

describe('ChatAgent', () => {
  it('reports a missing endpoint without touching history', async () => {
    const agent = new ChatAgent({ client: null, systemPrompt: 'sys', maxHistoryChars: 2000 });
    const result = await agent.reply('hello');
    expect(result.status).toBe('error');
    if (result.status === 'error') expect(result.errorCode).toBe('LLM_NOT_CONFIGURED');
    expect(agent.configured).toBe(false);
    expect(agent.messages).toEqual([{ role: 'system', content: 'sys' }]);
  });

  it('returns the reply as the message and keeps the conversation', async () => {
    const client = new FakeClient(['  Hi there  ', 'Fine']);
    const agent = new ChatAgent({ client, systemPrompt: 'sys', maxHistoryChars: 2000 });

    const first = await agent.reply('hello');
    expect(first.status).toBe('success');
    expect(first.message).toBe('Hi there');

    await agent.reply('how are you');
    expect(client.calls[1]).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: '  Hi there  ' },
      { role: 'user', content: 'how are you' },
    ]);
  });

  it('drops the oldest turns when history exceeds the limit', async () => {
    const client = new FakeClient(['bbbbbbbbbb', 'dddddddddd']);
    const agent = new ChatAgent({ client, systemPrompt: 'sys', maxHistoryChars: 25 });
    await agent.reply('aaaaaaaaaa');
    await agent.reply('cccccccccc');
    // 3 + 10 + 10 + 10 = 33 > 25, so the first user turn goes before the request.
    expect(client.calls[1]).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'assistant', content: 'bbbbbbbbbb' },
      { role: 'user', content: 'cccccccccc' },
    ]);
  });

  it('removes the unanswered turn when the endpoint fails', async () => {
    const client = new FakeClient([new Error('connect ECONNREFUSED')]);
    const agent = new ChatAgent({ client, systemPrompt: 'sys', maxHistoryChars: 2000 });
    const result = await agent.reply('hello');
    expect(result.status).toBe('error');
    expect(result.message).toBe('Failed to get a reply from the LLM endpoint: connect ECONNREFUSED');
    expect(agent.messages).toHaveLength(1);
  });

  it('replaces the system message', () => {
    const agent = new ChatAgent({ client: null, systemPrompt: 'sys', maxHistoryChars: 2000 });
    agent.updateSystemMessage('new');
    expect(agent.messages[0]).toEqual({ role: 'system', content: 'new' });
  });
});
