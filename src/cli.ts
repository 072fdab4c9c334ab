#!/usr/bin/env node

import { Command } from 'commander';
import fetch from 'node-fetch';
import chalk from 'chalk';
import { z } from 'zod';

const playerSchema = z.object({
  entityId: z.string(),
  name: z.string(),
  available: z.boolean(),
  state: z.string(),
  volumeLevel: z.number(),
  isVolumeMuted: z.boolean(),
  mediaTitle: z.string().nullable(),
  mediaArtist: z.string().nullable(),
});

const listResponseSchema = z.union([
  z.object({ success: z.literal(true), count: z.number(), players: z.array(playerSchema) }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

const commandResponseSchema = z.union([
  z.object({ success: z.literal(true), player: playerSchema }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

type Player = z.infer<typeof playerSchema>;

interface ServerOptions {
  server: string;
  apiKey?: string;
}

function headers(options: ServerOptions): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    ...(options.apiKey ? { 'X-API-Key': options.apiKey } : {}),
  };
}

function printPlayer(player: Player): void {
  const statusColor = player.available ? chalk.green : chalk.red;
  console.log(`${chalk.cyan(player.entityId)} - ${player.name} - ${statusColor(player.available ? 'available' : 'unavailable')}`);
  console.log(chalk.gray(`  State: ${player.state}, volume ${Math.round(player.volumeLevel * 100)}%${player.isVolumeMuted ? ' (muted)' : ''}`));
  if (player.mediaTitle) {
    console.log(chalk.gray(`  Now playing: ${player.mediaTitle}${player.mediaArtist ? ` - ${player.mediaArtist}` : ''}`));
  }
}

// `<action> [value]` from the command line as a request body
function buildCommandBody(action: string, value: string | undefined, mediaType: string): Record<string, unknown> {
  switch (action) {
    case 'set_volume':
      return { action, volume: Number(value) };
    case 'seek':
      return { action, position: Number(value) };
    case 'mute':
      return { action, muted: value !== 'false' };
    case 'play_media':
      return { action, mediaType, mediaId: value ?? '' };
    default:
      return { action };
  }
}

const program = new Command();

program
  .name('agent-cli')
  .description('CLI for the agent media bridge')
  .version('1.0.0');

program
  .command('players')
  .description('List all media players')
  .option('-s, --server <url>', 'Server URL', 'http://localhost:3002')
  .option('-k, --api-key <key>', 'API key')
  .action(async (options: ServerOptions) => {
    try {
      const response = await fetch(`${options.server}/api/media_players`, {
        headers: headers(options),
      });

      const result = listResponseSchema.parse(await response.json());

      if (result.success) {
        console.log(chalk.green(`✓ Found ${result.count} media player(s)`));
        console.log();
        result.players.forEach(printPlayer);
      } else {
        console.error(chalk.red('✗ Failed to get media players'));
        console.error(chalk.red(result.error));
      }
    } catch (error) {
      console.error(chalk.red('✗ Failed to connect to server'));
      console.error(error);
    }
  });

program
  .command('command <entityId> <action> [value]')
  .description('Send a command (play, pause, stop, turn_off, next, previous, volume_up, volume_down, mute, set_volume, seek, play_media)')
  .option('-s, --server <url>', 'Server URL', 'http://localhost:3002')
  .option('-k, --api-key <key>', 'API key')
  .option('-m, --media-type <type>', 'Media type for play_media', 'music')
  .action(async (entityId: string, action: string, value: string | undefined, options: ServerOptions & { mediaType: string }) => {
    try {
      const response = await fetch(`${options.server}/api/media_players/${encodeURIComponent(entityId)}/commands`, {
        method: 'POST',
        headers: headers(options),
        body: JSON.stringify(buildCommandBody(action, value, options.mediaType)),
      });

      const result = commandResponseSchema.parse(await response.json());

      if (result.success) {
        console.log(chalk.green(`✓ Sent ${action} to ${entityId}`));
        printPlayer(result.player);
      } else {
        console.error(chalk.red('✗ Command failed'));
        console.error(chalk.red(result.error));
      }
    } catch (error) {
      console.error(chalk.red('✗ Failed to connect to server'));
      console.error(error);
    }
  });

program.parse();
