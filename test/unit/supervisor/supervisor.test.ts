import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { Supervisor } from '../../../src/supervisor/supervisor.js';
import { TerminalAgent } from '../../../src/agent/terminal-agent.js';
import { ChatAgent } from '../../../src/llm/chat-agent.js';
import { InMemoryStore } from '../../../src/memory/in-memory-store.js';
import { AgentError, AgentErrorCode } from '../../../src/shared/errors.js';

describe('Supervisor', () => {
  let tmpDir: string;
  let memory: InMemoryStore;
  let supervisor: Supervisor;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'supervisor-test-'));
    memory = new InMemoryStore();
    const terminal = new TerminalAgent({ workingDirectory: tmpDir, commandTimeoutMs: 5000, maxOutputBytes: 1024, maxReadBytes: 1024 });
    const chat = new ChatAgent({
      client: { complete: async () => 'Closures capture variables.' },
      systemPrompt: 'sys',
      maxHistoryChars: 2000,
    });
    supervisor = new Supervisor({ terminal, chat, memory });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('sends file operations to the terminal agent and remembers them', async () => {
    const outcome = await supervisor.delegate('  create directory out  ');
    expect(outcome.agent).toBe('terminal');
    expect(outcome.taskId).toBe(1);
    expect(outcome.intent).toEqual({ kind: 'create-directory', path: 'out' });
    expect(outcome.result.status).toBe('success');

    const [record] = memory.findRelevant('directory');
    expect(record.userInput).toBe('create directory out');
    expect(record.response).toBe(`Directory created: ${path.join(tmpDir, 'out')}`);
  });

  it('sends free-form requests to the assistant', async () => {
    const outcome = await supervisor.delegate('what is a closure?');
    expect(outcome.agent).toBe('assistant');
    expect(outcome.result.message).toBe('Closures capture variables.');
    expect(memory.findRelevant('closure')[0].response).toBe('Closures capture variables.');
  });

  it('remembers failures in their formatted form', async () => {
    await supervisor.delegate('read file missing.txt');
    const [record] = memory.findRelevant('missing');
    expect(record.response).toBe(
      `Error: No such file or directory: ${path.join(tmpDir, 'missing.txt')}\n` +
        '  - Check the path spelling\n' +
        '  - List the parent directory to see what exists',
    );
  });

  it('refuses session commands', async () => {
    await expect(supervisor.delegate('quit')).rejects.toBeInstanceOf(AgentError);
    await expect(supervisor.delegate('help')).rejects.toMatchObject({ code: AgentErrorCode.NOT_A_TASK });
    expect(memory.findRelevant('')).toEqual([]);
  });
});
