import { createInterface, clearLine, cursorTo, type Interface } from 'node:readline';
import type { ConsolePort } from '../../ports/ConsolePort.js';
import { createLogger } from '../../utils/logger.js';

export interface TerminalAdapterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  promptText?: string;
}

export class TerminalAdapter implements ConsolePort {
  private readonly logger = createLogger({ adapter: 'TerminalAdapter' });
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly promptText: string;
  private rl: Interface | null = null;
  private lineHandlers: Array<(line: string) => void> = [];
  private closeHandlers: Array<(error?: Error) => void> = [];
  private closed = false;

  constructor(options: TerminalAdapterOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.promptText = options.promptText ?? 'Command: ';
  }

  start(): void {
    if (this.rl) {
      return;
    }

    const rl = createInterface({ input: this.input, output: this.output, terminal: isTTY(this.output) });
    rl.setPrompt(this.promptText);

    rl.on('line', (line: string) => {
      this.logger.debug({ line }, 'Line read');
      if (line.trim() === '') {
        rl.prompt();
      }
      for (const handler of this.lineHandlers) {
        handler(line);
      }
    });

    rl.on('close', () => this.notifyClose());

    const onError = (error: Error): void => {
      this.logger.error({ error }, 'Input stream error');
      this.notifyClose(error);
    };
    // Some Node releases re-emit input errors on the interface too
    rl.on('error', onError);
    this.input.on('error', onError);

    this.rl = rl;
    this.logger.debug('Terminal started');
  }

  print(text: string): void {
    if (!isTTY(this.output)) {
      this.output.write(`${text}\n`);
      return;
    }
    // Wipe the half-typed prompt line before writing, then redraw it below
    clearLine(this.output, 0);
    cursorTo(this.output, 0);
    this.output.write(`${text}\n`);
    if (this.rl && !this.closed) {
      this.rl.prompt(true);
    }
  }

  prompt(): void {
    if (this.rl && !this.closed) {
      this.rl.prompt(true);
    }
  }

  onLine(handler: (line: string) => void): void {
    this.lineHandlers.push(handler);
  }

  onClose(handler: (error?: Error) => void): void {
    this.closeHandlers.push(handler);
  }

  close(): void {
    this.rl?.close();
  }

  private notifyClose(error?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger.debug({ failed: Boolean(error) }, 'Input closed');
    for (const handler of this.closeHandlers) {
      handler(error);
    }
  }
}

function isTTY(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}
