#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { getDatabase } from './persistence/database.js';
import { FavouritesRepository } from './persistence/repositories/FavouritesRepository.js';
import { SettingsRepository } from './persistence/repositories/SettingsRepository.js';
import { OpenWeatherAdapter } from './adapters/weather/OpenWeatherAdapter.js';
import { OpenWeatherGeocodingAdapter } from './adapters/geocoding/OpenWeatherGeocodingAdapter.js';
import { TerminalAdapter } from './adapters/terminal/TerminalAdapter.js';
import { EventChannel } from './core/dispatcher/EventChannel.js';
import { CommandDispatcher } from './core/dispatcher/CommandDispatcher.js';
import { InputReader } from './core/input/InputReader.js';
import { formatHelp } from './core/format/formatters.js';
import type { DispatcherEvent } from './core/dispatcher/types.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting weather CLI');

  const db = getDatabase(config.databasePath);
  const terminal = new TerminalAdapter();
  const channel = new EventChannel<DispatcherEvent>();

  const dispatcher = new CommandDispatcher({
    channel,
    terminal,
    geocoding: new OpenWeatherGeocodingAdapter(config),
    weather: new OpenWeatherAdapter(config),
    favouritesRepository: new FavouritesRepository(db),
    settingsRepository: new SettingsRepository(db),
    defaultSettings: { language: config.defaultLanguage, units: config.defaultUnits },
  });

  // Closing stdin ends the process; fetches still in flight are abandoned
  const reader = new InputReader(terminal, channel, (error) => {
    logger.fatal({ error, inFlight: dispatcher.snapshot().inFlight }, 'Terminating');
    dispatcher.stop();
    db.close();
    process.exit(error.exitCode);
  });

  terminal.print(formatHelp());
  reader.start();
  await dispatcher.run();
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start application');
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
