#!/usr/bin/env node
import { config } from './config';
import { parseArgs, resolveConnectionSettings, USAGE } from './cli';
import { GameServerConnection } from './services/GameServerConnection';
import { OwnGameLogic } from './game/OwnGameLogic';
import { SCClient } from './game/SCClient';
import { createDefaultRng, createSeededRng } from '../shared/engine';
import { getExitCode, wrapError } from '../shared/errors';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);
  if (parsed.kind === 'help') {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return;
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const settings = resolveConnectionSettings(parsed.args, config);
  const rng = config.player.seed !== undefined ? createSeededRng(config.player.seed) : createDefaultRng();

  logger.info('Starting client', {
    host: settings.host,
    port: settings.port,
    gameType: config.game.gameType,
    seeded: config.player.seed !== undefined,
  });

  const connection = await GameServerConnection.connect(settings.host, settings.port);
  const client = new SCClient(connection, new OwnGameLogic(rng), {
    reservation: settings.reservation,
    gameType: config.game.gameType,
    moveTimeoutMs: config.player.moveTimeoutMs,
    rng,
  });

  const result = await client.run();
  if (!result) {
    logger.warn('Game ended without a result');
  }
}

main().catch((err: unknown) => {
  const error = wrapError(err);
  logger.error('Fatal error', { error: error.toJSON() });
  process.exitCode = getExitCode(error);
});
