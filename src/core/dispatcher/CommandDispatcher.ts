import type { ConsolePort } from '../../ports/ConsolePort.js';
import type { GeocodingPort } from '../../ports/GeocodingPort.js';
import type { WeatherPort } from '../../ports/WeatherPort.js';
import type { FavouritesRepository } from '../../persistence/repositories/FavouritesRepository.js';
import type { SettingsRepository } from '../../persistence/repositories/SettingsRepository.js';
import type { Command } from '../commands/parseCommand.js';
import type { EventChannel } from './EventChannel.js';
import type {
  DispatcherEvent,
  FavouritesBatch,
  FetchIntent,
  FetchOutcome,
  FetchRequest,
  FetchTarget,
  Settings,
} from './types.js';
import { Favourites } from '../favourites/Favourites.js';
import { describeTarget, runFetchTask } from '../fetch/FetchTask.js';
import { formatFavourites, formatHelp, formatWeather, NO_FAVOURITES } from '../format/formatters.js';
import { languageSchema, unitsSchema } from '../../config/schemas.js';
import { DuplicateFavouriteError, PersistenceError, toUserMessage } from '../../utils/errors.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export interface CommandDispatcherDependencies {
  channel: EventChannel<DispatcherEvent>;
  terminal: Pick<ConsolePort, 'print' | 'prompt'>;
  geocoding: GeocodingPort;
  weather: WeatherPort;
  favouritesRepository: Pick<FavouritesRepository, 'load' | 'save'>;
  settingsRepository: Pick<SettingsRepository, 'load' | 'save'>;
  defaultSettings: Settings;
}

/** Read-only view of the dispatcher's state, for the entry point and tests. */
export interface DispatcherSnapshot {
  inFlight: number;
  openBatches: number;
  favourites: ReturnType<Favourites['list']>;
  settings: Settings;
}

type CommandHandler = (command: Command) => Promise<void> | void;

/**
 * The single control loop. Consumes commands and fetch outcomes from one channel,
 * one at a time, and is the only code that mutates favourites or settings.
 */
export class CommandDispatcher {
  private readonly logger = createLogger({ service: 'CommandDispatcher' });
  private readonly deps: CommandDispatcherDependencies;
  private readonly favourites: Favourites;
  private settings: Settings;
  private readonly pending = new Map<number, FetchRequest>();
  private readonly batches = new Map<number, FavouritesBatch>();
  private readonly handlers: Map<string, CommandHandler>;
  private nextRequestId = 1;
  private nextBatchId = 1;

  constructor(deps: CommandDispatcherDependencies) {
    this.deps = deps;
    this.favourites = new Favourites(deps.favouritesRepository.load());
    this.settings = deps.settingsRepository.load(deps.defaultSettings);
    this.handlers = new Map<string, CommandHandler>([
      ['w', (command) => this.handleWeather(command)],
      ['f', () => this.handleFavouritesWeather()],
      ['list', () => this.handleList()],
      ['fav', (command) => this.handleAddFavourite(command)],
      ['remove', (command) => this.handleRemoveFavourite(command)],
      ['lang', (command) => this.handleLanguage(command)],
      ['units', (command) => this.handleUnits(command)],
      ['help', () => this.print(formatHelp())],
    ]);

    this.logger.info(
      { favourites: this.favourites.size, settings: this.settings },
      'Dispatcher state loaded'
    );
  }

  snapshot(): DispatcherSnapshot {
    return {
      inFlight: this.pending.size,
      openBatches: this.batches.size,
      favourites: this.favourites.list(),
      settings: { ...this.settings },
    };
  }

  /** Handles events until the channel is closed. */
  async run(): Promise<void> {
    this.logger.info('Dispatcher loop started');
    this.deps.terminal.prompt();
    for await (const event of this.deps.channel) {
      await this.dispatch(event);
    }
    this.logger.info({ abandoned: this.pending.size }, 'Dispatcher loop stopped');
  }

  stop(): void {
    this.deps.channel.close();
  }

  async dispatch(event: DispatcherEvent): Promise<void> {
    if (event.kind === 'outcome') {
      this.handleOutcome(event.outcome);
      return;
    }

    const { command } = event;
    const logger = this.logger.child({ correlationId: generateCorrelationId(), verb: command.verb });
    logger.debug({ args: command.args }, 'Handling command');

    try {
      const handler = this.handlers.get(command.verb);
      if (handler) {
        await handler(command);
      } else {
        this.print(`Unknown command: ${command.verb}`);
      }
    } catch (error) {
      logger.warn({ error }, 'Command failed');
      this.print(toUserMessage(error));
    } finally {
      this.deps.terminal.prompt();
    }
  }

  private handleWeather(command: Command): void {
    const [city, country] = command.args;
    if (!city) {
      this.print('Missing city parameter');
      return;
    }
    this.spawn({ kind: 'query', city, country }, { kind: 'direct' });
  }

  private handleFavouritesWeather(): void {
    const favourites = this.favourites.list();
    if (favourites.length === 0) {
      this.print(NO_FAVOURITES);
      return;
    }

    const batchId = this.nextBatchId++;
    this.batches.set(batchId, { total: favourites.length, remaining: favourites.length, failed: 0 });
    for (const location of favourites) {
      this.spawn({ kind: 'location', location }, { kind: 'favourites', batchId });
    }
  }

  private handleList(): void {
    this.print(formatFavourites(this.favourites.list()));
  }

  private async handleAddFavourite(command: Command): Promise<void> {
    const [city, country] = command.args;
    if (!city) {
      this.print('Missing city parameter');
      return;
    }
    if (this.favourites.has(city)) {
      throw new DuplicateFavouriteError(city);
    }

    // Awaited in the loop: nothing else is handled until the location resolves
    const location = await this.deps.geocoding.resolve(city, country);
    this.favourites.add(location);

    this.persistFavourites(`New location ${location.city}, ${location.country} added to favourites`);
  }

  private handleRemoveFavourite(command: Command): void {
    const [city] = command.args;
    if (!city) {
      this.print('Missing city parameter');
      return;
    }
    const removed = this.favourites.remove(city);
    this.persistFavourites(`City ${removed.city} successfully removed from favourites`);
  }

  private handleLanguage(command: Command): void {
    const parsed = languageSchema.safeParse(command.args[0]);
    if (!parsed.success) {
      this.print('Usage: lang <code>, e.g. lang en or lang pt_br');
      return;
    }
    this.settings = { ...this.settings, language: parsed.data };
    this.persistSettings(`Language set to ${parsed.data}`);
  }

  private handleUnits(command: Command): void {
    const parsed = unitsSchema.safeParse(command.args[0]?.toLowerCase());
    if (!parsed.success) {
      this.print(`Usage: units <${unitsSchema.options.join('|')}>`);
      return;
    }
    this.settings = { ...this.settings, units: parsed.data };
    this.persistSettings(`Units set to ${parsed.data}`);
  }

  private persistFavourites(confirmation: string): void {
    this.persist(confirmation, () => this.deps.favouritesRepository.save(this.favourites.list()));
  }

  private persistSettings(confirmation: string): void {
    this.persist(confirmation, () => this.deps.settingsRepository.save(this.settings));
  }

  // The in-memory change stays either way; only a successful save is confirmed
  private persist(confirmation: string, save: () => void): void {
    try {
      save();
    } catch (error) {
      this.logger.error({ error }, 'Failed to persist change');
      const cause = toUserMessage(error);
      throw new PersistenceError(`${confirmation} but could not be saved: ${cause}`, { cause: error });
    }
    this.print(confirmation);
  }

  private spawn(target: FetchTarget, intent: FetchIntent): void {
    const request: FetchRequest = {
      id: this.nextRequestId++,
      target,
      intent,
      language: this.settings.language,
      units: this.settings.units,
    };
    this.pending.set(request.id, request);

    const deliver = (outcome: FetchOutcome): void => {
      if (!this.deps.channel.push({ kind: 'outcome', outcome })) {
        this.logger.debug({ requestId: request.id }, 'Outcome dropped; dispatcher has stopped');
      }
    };

    runFetchTask(request, this.deps, deliver).catch((error) => {
      this.logger.error({ error, requestId: request.id }, 'Fetch task failed to deliver its outcome');
    });
  }

  private handleOutcome(outcome: FetchOutcome): void {
    const { request } = outcome;
    if (!this.pending.delete(request.id)) {
      this.logger.warn({ requestId: request.id }, 'Ignoring outcome for unknown request');
      return;
    }

    if (outcome.status === 'success') {
      this.print(formatWeather(outcome.weather, request.units));
    } else {
      this.print(`Could not fetch weather for ${describeTarget(request.target)}: ${outcome.error.message}`);
    }

    if (request.intent.kind === 'favourites') {
      this.completeBatchMember(request.intent.batchId, outcome.status === 'error');
    }
  }

  private completeBatchMember(batchId: number, failed: boolean): void {
    const batch = this.batches.get(batchId);
    if (!batch) {
      return;
    }
    batch.remaining -= 1;
    if (failed) {
      batch.failed += 1;
    }
    if (batch.remaining === 0) {
      this.batches.delete(batchId);
      this.print(`Fetched weather for ${batch.total - batch.failed}/${batch.total} favourites`);
    }
  }

  private print(text: string): void {
    this.deps.terminal.print(text);
  }
}
