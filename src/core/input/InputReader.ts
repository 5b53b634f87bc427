import type { ConsolePort } from '../../ports/ConsolePort.js';
import type { EventChannel } from '../dispatcher/EventChannel.js';
import type { DispatcherEvent } from '../dispatcher/types.js';
import { parseCommand } from '../commands/parseCommand.js';
import { InputStreamError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Turns terminal lines into commands on the dispatcher's channel.
 * Blank lines are dropped here; verbs are left for the dispatcher.
 */
export class InputReader {
  private readonly logger = createLogger({ component: 'InputReader' });

  constructor(
    private readonly terminal: Pick<ConsolePort, 'onLine' | 'onClose' | 'start'>,
    private readonly channel: EventChannel<DispatcherEvent>,
    private readonly onFatal: (error: InputStreamError) => void
  ) {}

  start(): void {
    this.terminal.onLine((line) => {
      const command = parseCommand(line);
      if (!command) {
        return;
      }
      if (!this.channel.push({ kind: 'command', command })) {
        this.logger.warn({ verb: command.verb }, 'Command dropped; dispatcher has stopped');
      }
    });

    this.terminal.onClose((cause) => {
      const error = cause
        ? new InputStreamError(`Failed to read input: ${cause.message}`, { cause })
        : new InputStreamError('Input stream closed');
      this.logger.fatal({ error }, 'Input stream ended');
      this.onFatal(error);
    });

    this.terminal.start();
  }
}
