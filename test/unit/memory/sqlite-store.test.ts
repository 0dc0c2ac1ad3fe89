import os from 'os';
import path from 'path';
import fs from 'fs';
import { SqliteMemoryStore } from '../../../src/memory/sqlite-store.js';

describe('SqliteMemoryStore', () => {
  let store: SqliteMemoryStore;

  beforeEach(() => {
    store = new SqliteMemoryStore(':memory:', 2);
  });

  afterEach(() => {
    store.close();
  });

  it('returns increasing task ids', () => {
    expect(store.save('terminal', 'create directory a', 'Directory created: /w/a')).toBe(1);
    expect(store.save('assistant', 'hello', 'Hi there')).toBe(2);
  });

  it('finds records by input text, newest first, up to the limit', () => {
    store.save('terminal', 'create file one.txt', 'File created');
    store.save('terminal', 'create file two.txt', 'File created');
    store.save('terminal', 'create file three.txt', 'File created');
    store.save('assistant', 'tell me a joke', 'No.');

    const found = store.findRelevant('create file');
    expect(found.map((r) => r.userInput)).toEqual(['create file three.txt', 'create file two.txt']);
    expect(found[0]).toMatchObject({ id: 3, agent: 'terminal', response: 'File created' });
    expect(store.findRelevant('CREATE', 10)).toHaveLength(3);
  });

  it('treats LIKE wildcards in the query literally', () => {
    store.save('terminal', 'write 100% done to status.txt', 'File written');
    store.save('terminal', 'write 100 items to list.txt', 'File written');
    expect(store.findRelevant('100%').map((r) => r.id)).toEqual([1]);
  });

  it('creates the database file and its directory', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-test-'));
    const dbPath = path.join(tmpDir, 'nested', 'agent_memory.db');
    const fileStore = new SqliteMemoryStore(dbPath);
    fileStore.save('terminal', 'ls', 'Command executed');
    fileStore.close();

    const reopened = new SqliteMemoryStore(dbPath);
    expect(reopened.findRelevant('ls')).toHaveLength(1);
    reopened.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });
});
