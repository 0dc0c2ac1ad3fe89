import { interpret, describeIntent } from '../../../src/interpreter/interpreter.js';

describe('interpret: built-ins', () => {
  it('treats blank input as empty', () => {
    expect(interpret('')).toEqual({ kind: 'empty' });
    expect(interpret('   ')).toEqual({ kind: 'empty' });
  });

  it('recognizes help and quit in any case', () => {
    expect(interpret('HELP')).toEqual({ kind: 'help' });
    expect(interpret('?')).toEqual({ kind: 'help' });
    expect(interpret('Exit')).toEqual({ kind: 'quit' });
    expect(interpret('quit')).toEqual({ kind: 'quit' });
  });

  it('parses run tests with and without a file', () => {
    expect(interpret('run tests')).toEqual({ kind: 'run-tests', file: null });
    expect(interpret('run tests  my_tasks.txt')).toEqual({ kind: 'run-tests', file: 'my_tasks.txt' });
  });

  it('parses recall', () => {
    expect(interpret('recall notes')).toEqual({ kind: 'recall', query: 'notes' });
  });
});

describe('interpret: explicit shell', () => {
  it('accepts every shell prefix', () => {
    expect(interpret('run command ls -la')).toEqual({ kind: 'run-command', command: 'ls -la', explicit: true });
    expect(interpret('!pwd')).toEqual({ kind: 'run-command', command: 'pwd', explicit: true });
    expect(interpret('$ echo hi')).toEqual({ kind: 'run-command', command: 'echo hi', explicit: true });
    expect(interpret('/sh git status')).toEqual({ kind: 'run-command', command: 'git status', explicit: true });
  });

  it('does not read "create file" after a shell prefix as a file operation', () => {
    expect(interpret('!touch a.txt')).toEqual({ kind: 'run-command', command: 'touch a.txt', explicit: true });
  });
});

describe('interpret: file operations', () => {
  it('parses write and append with a target path', () => {
    expect(interpret('write hello world to notes.txt')).toEqual({
      kind: 'write-file', path: 'notes.txt', content: 'hello world', mode: 'overwrite',
    });
    expect(interpret("append ' two' to log.txt")).toEqual({
      kind: 'write-file', path: 'log.txt', content: ' two', mode: 'append',
    });
  });

  it('parses the :: separator form', () => {
    expect(interpret('write notes.txt :: line one')).toEqual({
      kind: 'write-file', path: 'notes.txt', content: 'line one', mode: 'overwrite',
    });
  });

  it('leaves prose that starts with "write" to the assistant', () => {
    expect(interpret('write a poem in english')).toEqual({ kind: 'chat', prompt: 'write a poem in english' });
  });

  it('parses directory creation', () => {
    expect(interpret('create directory projects')).toEqual({ kind: 'create-directory', path: 'projects' });
    expect(interpret('make a new folder called My Stuff')).toEqual({ kind: 'create-directory', path: 'My Stuff' });
    expect(interpret('mkdir -p src/lib')).toEqual({ kind: 'create-directory', path: 'src/lib' });
  });

  it('sends multi-argument mkdir to the shell', () => {
    expect(interpret('mkdir a b')).toEqual({ kind: 'run-command', command: 'mkdir a b', explicit: false });
  });

  it('parses file creation with and without content', () => {
    expect(interpret('create file notes.txt')).toEqual({ kind: 'create-file', path: 'notes.txt', content: '' });
    expect(interpret('create a file named hello.txt with content Hello, World!')).toEqual({
      kind: 'create-file', path: 'hello.txt', content: 'Hello, World!',
    });
    expect(interpret('create file data.txt containing: 42')).toEqual({ kind: 'create-file', path: 'data.txt', content: '42' });
    expect(interpret('create file a.txt with content:hi')).toEqual({ kind: 'create-file', path: 'a.txt', content: 'hi' });
    expect(interpret('create file notes.txt with content')).toEqual({ kind: 'create-file', path: 'notes.txt', content: '' });
    expect(interpret('touch app.ts')).toEqual({ kind: 'create-file', path: 'app.ts', content: '' });
  });

  it('keeps the case of paths', () => {
    expect(interpret('Create File Notes.TXT')).toEqual({ kind: 'create-file', path: 'Notes.TXT', content: '' });
  });

  it('parses reads', () => {
    expect(interpret('read file notes.txt')).toEqual({ kind: 'read-file', path: 'notes.txt' });
    expect(interpret('show the contents of file README.md')).toEqual({ kind: 'read-file', path: 'README.md' });
    expect(interpret('read ./src/index.ts')).toEqual({ kind: 'read-file', path: './src/index.ts' });
    expect(interpret('show the contents of notes.txt')).toEqual({ kind: 'read-file', path: 'notes.txt' });
  });

  it('parses listings', () => {
    expect(interpret('list files')).toEqual({ kind: 'list-directory', path: '.' });
    expect(interpret('list')).toEqual({ kind: 'list-directory', path: '.' });
    expect(interpret('list files in src')).toEqual({ kind: 'list-directory', path: 'src' });
    expect(interpret('list src')).toEqual({ kind: 'list-directory', path: 'src' });
    expect(interpret('list all files in the current directory')).toEqual({ kind: 'list-directory', path: '.' });
    expect(interpret('list directory docs')).toEqual({ kind: 'list-directory', path: 'docs' });
  });

  it('lists only for lines that start with "list"', () => {
    expect(interpret('show all files in src')).toEqual({ kind: 'chat', prompt: 'show all files in src' });
  });

  it('strips a leading "please" before file rules only', () => {
    expect(interpret('please create directory tmp')).toEqual({ kind: 'create-directory', path: 'tmp' });
    expect(interpret('Please explain closures')).toEqual({ kind: 'chat', prompt: 'Please explain closures' });
  });
});

describe('interpret: implicit shell and chat', () => {
  it('detects shell commands by their first word', () => {
    expect(interpret('ls -la')).toEqual({ kind: 'run-command', command: 'ls -la', explicit: false });
    expect(interpret('git status')).toEqual({ kind: 'run-command', command: 'git status', explicit: false });
    expect(interpret('sudo systemctl restart nginx')).toEqual({
      kind: 'run-command', command: 'sudo systemctl restart nginx', explicit: false,
    });
  });

  it('needs a shell-shaped argument for words that are also English', () => {
    expect(interpret("find . -name '*.ts'")).toEqual({ kind: 'run-command', command: "find . -name '*.ts'", explicit: false });
    expect(interpret('find my keys')).toEqual({ kind: 'chat', prompt: 'find my keys' });
  });

  it('sends everything else to the assistant', () => {
    expect(interpret('read chapter one')).toEqual({ kind: 'chat', prompt: 'read chapter one' });
    expect(interpret('What is a closure?')).toEqual({ kind: 'chat', prompt: 'What is a closure?' });
  });
});

describe('describeIntent', () => {
  it('describes intents in one line', () => {
    expect(describeIntent({ kind: 'write-file', path: 'a.txt', content: 'hello', mode: 'append' })).toBe(
      'append to file a.txt (5 chars)',
    );
    expect(describeIntent({ kind: 'run-tests', file: null })).toBe('run tests from the default task file');
    expect(describeIntent({ kind: 'recall', query: 'notes' })).toBe('recall memory matching "notes"');
    expect(describeIntent({ kind: 'run-command', command: 'ls', explicit: false })).toBe('run command: ls');
  });
});
