import { AgentError, AgentErrorCode } from '../../../src/shared/errors.js';

describe('AgentError', () => {
  it('creates error with code and message', () => {
    const err = new AgentError(AgentErrorCode.TASK_FILE_NOT_FOUND, 'Task file not found: tasks.txt');
    expect(err.code).toBe(AgentErrorCode.TASK_FILE_NOT_FOUND);
    expect(err.message).toBe('Task file not found: tasks.txt');
    expect(err.name).toBe('AgentError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new AgentError(AgentErrorCode.CONFIG_INVALID, 'Invalid configuration', { issues: ['llm.model: Required'] });
    expect(err.context).toEqual({ issues: ['llm.model: Required'] });
  });
});
