import os from 'os';
import path from 'path';
import { expandHome, resolveAgainst } from '../../../src/shared/paths.js';

describe('expandHome', () => {
  it('expands a bare tilde and a tilde prefix', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/notes')).toBe(path.join(os.homedir(), 'notes'));
  });

  it('leaves other paths alone', () => {
    expect(expandHome('notes/~draft')).toBe('notes/~draft');
  });
});

describe('resolveAgainst', () => {
  it('resolves relative paths against the base directory', () => {
    expect(resolveAgainst('/srv/work', 'docs/a.txt')).toBe('/srv/work/docs/a.txt');
    expect(resolveAgainst('/srv/work', '../other')).toBe('/srv/other');
  });

  it('keeps absolute paths', () => {
    expect(resolveAgainst('/srv/work', '/etc/hosts')).toBe('/etc/hosts');
  });
});
