export interface ConsolePort {
  print(text: string): void;
  /** Show the input prompt again, keeping whatever the user has typed so far. */
  prompt(): void;
  onLine(handler: (line: string) => void): void;
  /** Called once when the input stream ends; `error` is set when it failed rather than closed. */
  onClose(handler: (error?: Error) => void): void;
  start(): void;
  close(): void;
}
