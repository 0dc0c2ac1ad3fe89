import { InMemoryStore } from '../../../src/memory/in-memory-store.js';
import { openMemoryStore } from '../../../src/memory/index.js';
import { SqliteMemoryStore } from '../../../src/memory/sqlite-store.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';

describe('InMemoryStore', () => {
  it('numbers tasks and searches case-insensitively', () => {
    const store = new InMemoryStore(5);
    expect(store.save('terminal', 'List files', 'Directory is empty: /w')).toBe(1);
    expect(store.save('assistant', 'what is a file?', 'A file is...')).toBe(2);
    expect(store.findRelevant('FILE').map((r) => r.id)).toEqual([2, 1]);
    expect(store.findRelevant('file', 1).map((r) => r.id)).toEqual([2]);
  });
});

describe('openMemoryStore', () => {
  it('uses the in-process store when memory is disabled', () => {
    const store = openMemoryStore({ ...DEFAULT_CONFIG, memory: { ...DEFAULT_CONFIG.memory, enabled: false } });
    expect(store).toBeInstanceOf(InMemoryStore);
  });

  it('opens SQLite when memory is enabled', () => {
    const store = openMemoryStore({ ...DEFAULT_CONFIG, memory: { ...DEFAULT_CONFIG.memory, database: ':memory:' } });
    expect(store).toBeInstanceOf(SqliteMemoryStore);
    store.close();
  });
});
