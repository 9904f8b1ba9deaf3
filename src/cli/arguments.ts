import { parseArgs } from 'util';
import { SelectionMode } from '../download/core/types';
import { PlaylistFetchError, errorMessage } from '../download/core/errors';

export class UsageError extends PlaylistFetchError {
  readonly code = 'USAGE';
}

export type CliCommand =
  | { kind: 'download'; playlistId: string; mode: SelectionMode; dryRun: boolean }
  | { kind: 'export' }
  | { kind: 'help' };

export const USAGE = `Usage: playlist-fetch [options] PLAYLIST_ID

PLAYLIST_ID is a numeric playlist id or a playlist url containing "id=".

Options:
  -D  dry run (record history and meta data, without downloading)
  -H  pick the highest bitrate available instead of the default fallback order
  -j  export history to songs_id.json and fill in missing meta data
  -h  show this help`;

/**
 * Accepts "123" or a url such as https://music.163.com/#/playlist?id=123
 */
export function parsePlaylistId(input: string): string {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    // The web player keeps its routes behind "#", so drop it to reach the query
    url = new URL(trimmed.replace('/#', ''));
  } catch {
    throw new UsageError(`Invalid playlist id or url: '${input}'`);
  }

  const id = url.searchParams.get('id');
  if (id === null) {
    throw new UsageError(`Invalid url: '${input}' does not contain query key 'id'`);
  }
  if (!/^\d+$/.test(id)) {
    throw new UsageError(`Invalid url: '${input}' contains an empty or non-integer id`);
  }
  return id;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'dry-run': { type: 'boolean', short: 'D' },
        highest: { type: 'boolean', short: 'H' },
        json: { type: 'boolean', short: 'j' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export function parseArguments(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected one playlist id, got ${positionals.length}`);
  }

  if (values.json) {
    if (values['dry-run'] || values.highest || positionals.length > 0) {
      throw new UsageError('-j cannot be combined with -D, -H or a playlist id');
    }
    return { kind: 'export' };
  }

  if (positionals.length === 0) {
    throw new UsageError('Missing playlist id');
  }

  return {
    kind: 'download',
    playlistId: parsePlaylistId(positionals[0]),
    mode: values.highest ? SelectionMode.HIGHEST : SelectionMode.DEFAULT,
    dryRun: values['dry-run'] === true,
  };
}
