export type Command =
  | { type: 'add'; flightNumber: string }
  | { type: 'remove'; flightNumber: string | null }
  | { type: 'select'; target: number | 'next' | 'previous' }
  | { type: 'refresh' }
  | { type: 'list' }
  | { type: 'history'; prefix: string | null }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'unknown'; input: string; reason: string };

const ALIASES: Readonly<Record<string, string>> = {
  a: 'add',
  rm: 'remove',
  del: 'remove',
  s: 'select',
  n: 'next',
  p: 'prev',
  r: 'refresh',
  ls: 'list',
  h: 'history',
  '?': 'help',
  q: 'quit',
  exit: 'quit',
};

/**
 * Parses one line typed at the prompt. Verbs are case-insensitive;
 * an empty line re-lists the tracked flights.
 */
export function parseCommand(line: string): Command {
  const input = line.trim();
  if (input === '') {
    return { type: 'list' };
  }

  const [head, ...rest] = input.split(/\s+/);
  const verb = ALIASES[head.toLowerCase()] ?? head.toLowerCase();
  const argument = rest.join(' ');

  switch (verb) {
    case 'add':
      return argument
        ? { type: 'add', flightNumber: argument }
        : { type: 'unknown', input, reason: 'Usage: add <flight number>' };
    case 'remove':
      return { type: 'remove', flightNumber: argument || null };
    case 'select': {
      const position = Number(argument);
      if (!Number.isInteger(position) || position < 1) {
        return { type: 'unknown', input, reason: 'Usage: select <list position>' };
      }
      return { type: 'select', target: position - 1 };
    }
    case 'next':
      return { type: 'select', target: 'next' };
    case 'prev':
    case 'previous':
      return { type: 'select', target: 'previous' };
    case 'refresh':
      return { type: 'refresh' };
    case 'list':
      return { type: 'list' };
    case 'history':
      return { type: 'history', prefix: argument || null };
    case 'help':
      return { type: 'help' };
    case 'quit':
      return { type: 'quit' };
    default:
      return { type: 'unknown', input, reason: `Unknown command "${head}". Type "help" for commands.` };
  }
}

export const HELP_LINES: readonly string[] = [
  'Commands:',
  '  add <flight>      track a flight, e.g. "add UA100"',
  '  remove [flight]   stop tracking a flight (default: the selected one)',
  '  select <n>        select the n-th flight; next / prev move the cursor',
  '  refresh           fetch every tracked flight now',
  '  list              show tracked flights',
  '  history [prefix]  recently tracked flight numbers',
  '  help              show this help',
  '  quit              exit',
];
