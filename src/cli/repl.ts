import readline from 'readline';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { HistoryStore } from '../services/HistoryStore';
import type { TrackingOrchestrator } from '../services/TrackingOrchestrator';
import type { OrchestratorPhase } from '../types/flight.types';
import { HELP_LINES, parseCommand, type Command } from './commands';
import {
  renderHistory,
  renderSnapshot,
  renderSummary,
} from './render';

export type Print = (lines: readonly string[]) => void;

export interface CommandContext {
  orchestrator: TrackingOrchestrator;
  history: Pick<HistoryStore, 'list' | 'matching'>;
  print: Print;
}

export type CommandResult = 'continue' | 'quit';

export async function executeCommand(command: Command, context: CommandContext): Promise<CommandResult> {
  const { orchestrator, history, print } = context;

  switch (command.type) {
    case 'add': {
      const result = orchestrator.addFlight(command.flightNumber);
      if (!result.ok) {
        print([result.reason === 'duplicate'
          ? `${result.flightNumber ?? command.flightNumber} is already tracked.`
          : 'Enter a flight number, e.g. "add UA100".']);
        return 'continue';
      }
      print([`Tracking ${result.flight.flight.flightNumber} (callsign ${result.flight.flight.icaoCallsign}).`]);
      result.initialFetch
        .then(() => print(renderSnapshot(orchestrator.snapshot())))
        .catch((error: unknown) => {
          logger.error('Initial fetch failed', { error: errorMessage(error) });
        });
      return 'continue';
    }
    case 'remove': {
      const removed = command.flightNumber
        ? orchestrator.removeFlight(command.flightNumber)
        : orchestrator.removeSelected();
      print([removed ? `Stopped tracking ${removed}.` : 'No such flight.']);
      return 'continue';
    }
    case 'select': {
      if (command.target === 'next') {
        orchestrator.selectNext();
      } else if (command.target === 'previous') {
        orchestrator.selectPrevious();
      } else if (!orchestrator.select(command.target)) {
        print([`No flight at position ${command.target + 1}.`]);
        return 'continue';
      }
      print(renderSnapshot(orchestrator.snapshot()));
      return 'continue';
    }
    case 'refresh': {
      const summary = await orchestrator.refresh('user');
      print([renderSummary(summary)]);
      return 'continue';
    }
    case 'list':
      print(renderSnapshot(orchestrator.snapshot()));
      return 'continue';
    case 'history':
      print(renderHistory(command.prefix ? history.matching(command.prefix) : history.list()));
      return 'continue';
    case 'help':
      print(HELP_LINES);
      return 'continue';
    case 'quit':
      return 'quit';
    default:
      print([command.reason]);
      return 'continue';
  }
}

export interface ReplOptions extends Omit<CommandContext, 'print'> {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Line-oriented front end. Prints the flight list after every finished
 * refresh cycle and resolves when the user quits or input closes.
 */
export function runRepl({
  orchestrator, history, input, output,
}: ReplOptions): Promise<void> {
  const print: Print = (lines) => {
    output.write(`${lines.join('\n')}\n`);
  };

  let lastPhase: OrchestratorPhase = orchestrator.getPhase();
  const unsubscribe = orchestrator.subscribe((snapshot) => {
    if (lastPhase === 'Refreshing' && snapshot.phase === 'Idle') {
      print(renderSnapshot(snapshot));
    }
    lastPhase = snapshot.phase;
  });

  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise<void>((resolve) => {
    rl.on('line', (line) => {
      executeCommand(parseCommand(line), { orchestrator, history, print })
        .then((result) => {
          if (result === 'quit') {
            rl.close();
          }
        })
        .catch((error: unknown) => {
          logger.error('Command failed', { error: errorMessage(error) });
        });
    });

    rl.on('close', () => {
      unsubscribe();
      resolve();
    });

    print(['flight-watch: type "help" for commands.']);
  });
}
