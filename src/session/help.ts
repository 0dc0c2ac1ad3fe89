export const HELP_TEXT = `Available commands:
  create directory <name>            make a directory (also: mkdir <name>)
  create file <name> [with content <text>]
                                     make a new file; never overwrites (also: touch <name>)
  write <content> to <file>          replace a file's content (also: write <file> :: <content>)
  append <content> to <file>         add to the end of a file
  read file <name>                   print a file's content
  list files [in <dir>]              list a directory (also: ls, list <dir>)
  run command <cmd>                  run a shell command (also: !<cmd>, $ <cmd>, /sh <cmd>)
  run tests [file]                   queue every task in a task file (default: test_tasks.txt)
  recall <text>                      show remembered tasks that mention <text>
  help                               show this help
  quit | exit                        leave once queued tasks are done
Anything else is sent to the assistant.
`;
