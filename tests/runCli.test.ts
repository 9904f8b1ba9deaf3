import fs from 'fs/promises';
import path from 'path';
import { runCli } from '../src/cli/runCli';
import { ExitCode } from '../src/cli/exitCodes';
import { USAGE } from '../src/cli/arguments';
import { EXPORT_FILE, HISTORY_FILE, HistoryStore } from '../src/storage/HistoryStore';
import { META_FILE } from '../src/storage/MetaStore';
import { LOCK_FILE } from '../src/storage/StateLock';
import { encodeHistory } from '../src/storage/historyCodec';
import { BitrateVariant, TrackRef, TransferResult, VariantOffer } from '../src/download/core/types';
import { FakeCatalog, makeTempDir, makeTrack, removeDir } from './helpers/fakes';

const { LOW, MID, HIGH } = BitrateVariant;

describe('runCli', () => {
  let root: string;
  let stateDir: string;
  let outputDir: string;
  let env: NodeJS.ProcessEnv;
  let output: string[];
  let catalog: FakeCatalog;
  let transfer: jest.Mock<Promise<TransferResult>, [TrackRef, VariantOffer]>;

  const run = (...argv: string[]) =>
    runCli(argv, env, {
      catalog,
      transfer: { name: 'fake', transfer },
      write: (text) => output.push(text),
    });

  const loadHistory = async () => {
    const history = new HistoryStore(stateDir);
    await history.load();
    return history;
  };

  beforeEach(async () => {
    root = await makeTempDir();
    stateDir = path.join(root, 'state');
    outputDir = path.join(root, 'music');
    env = { STATE_DIRECTORY: stateDir, OUTPUT_DIRECTORY: outputDir };
    output = [];
    catalog = new FakeCatalog(
      { '1000': [makeTrack('1', [LOW, MID, HIGH]), makeTrack('2', [LOW])] },
      [makeTrack('1', [LOW, MID, HIGH]), makeTrack('2', [LOW])],
    );
    transfer = jest.fn(
      async (track: TrackRef, offer: VariantOffer): Promise<TransferResult> => ({
        filePath: path.join(outputDir, `${track.id}.${offer.extension}`),
        filesize: 1,
      }),
    );
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should print usage for -h', async () => {
    await expect(run('-h')).resolves.toBe(ExitCode.OK);
    expect(output).toEqual([`${USAGE}\n`]);
  });

  it('should print usage and exit 64 for bad arguments', async () => {
    await expect(run()).resolves.toBe(ExitCode.USAGE);
    expect(output).toEqual([`${USAGE}\n`]);
  });

  it('should download a playlist and persist history', async () => {
    await expect(run('https://music.163.com/#/playlist?id=1000')).resolves.toBe(ExitCode.OK);

    expect(transfer).toHaveBeenCalledTimes(2);
    expect((await fs.stat(outputDir)).isDirectory()).toBe(true);
    const history = await loadHistory();
    expect(history.records()).toEqual([
      { trackId: '1', bitrate: MID },
      { trackId: '2', bitrate: LOW },
    ]);
    await expect(fs.access(path.join(stateDir, LOCK_FILE))).rejects.toThrow();
  });

  it('should record without downloading in dry-run', async () => {
    await expect(run('-D', '-H', '1000')).resolves.toBe(ExitCode.OK);

    expect(transfer).not.toHaveBeenCalled();
    await expect(fs.access(outputDir)).rejects.toThrow();
    const history = await loadHistory();
    expect(history.contains('1', HIGH)).toBe(true);
    expect(history.contains('2', LOW)).toBe(true);
  });

  it('should still succeed when some tracks fail', async () => {
    transfer.mockRejectedValueOnce(new Error('reset'));

    await expect(run('1000')).resolves.toBe(ExitCode.OK);

    const history = await loadHistory();
    expect(history.trackIds()).toEqual(['2']);
  });

  it('should exit 1 without writing history when the playlist is unknown', async () => {
    await expect(run('999')).resolves.toBe(ExitCode.RESOLUTION_FAILED);

    await expect(fs.access(path.join(stateDir, HISTORY_FILE))).rejects.toThrow();
  });

  it('should exit 69 when the catalog is unavailable', async () => {
    catalog.unavailable = true;

    await expect(run('1000')).resolves.toBe(ExitCode.UNAVAILABLE);
  });

  it('should exit 75 while another process holds the state directory', async () => {
    await fs.mkdir(stateDir, { recursive: true });
    await fs.writeFile(path.join(stateDir, LOCK_FILE), `${process.pid}\n`);

    await expect(run('1000')).resolves.toBe(ExitCode.TEMP_FAIL);
    expect(catalog.playlistCalls).toEqual([]);
  });

  it('should exit 65 on corrupt metadata', async () => {
    await fs.mkdir(stateDir, { recursive: true });
    await fs.writeFile(path.join(stateDir, META_FILE), '[');

    await expect(run('1000')).resolves.toBe(ExitCode.DATA_ERROR);
    expect(await fs.readFile(path.join(stateDir, META_FILE), 'utf-8')).toBe('[');
  });

  it('should exit 78 on invalid configuration', async () => {
    env.FLUSH_EVERY = '0';

    await expect(run('1000')).resolves.toBe(ExitCode.CONFIG);
  });

  describe('-j', () => {
    beforeEach(async () => {
      await fs.mkdir(stateDir, { recursive: true });
      await fs.writeFile(
        path.join(stateDir, HISTORY_FILE),
        encodeHistory([
          { trackId: '2', bitrate: LOW },
          { trackId: '1', bitrate: MID },
        ]),
      );
    });

    it('should export history and fill in metadata', async () => {
      await expect(run('-j')).resolves.toBe(ExitCode.OK);

      const exported = JSON.parse(await fs.readFile(path.join(stateDir, EXPORT_FILE), 'utf-8'));
      expect(exported).toEqual([
        { id: '1', bitrate: 'mid' },
        { id: '2', bitrate: 'low' },
      ]);
      const history = await loadHistory();
      expect(history.meta.get('1')).toMatchObject({ name: 'Song 1', bitrate: MID });
      expect(catalog.playlistCalls).toEqual([]);
    });

    it('should export even when the catalog is unavailable', async () => {
      catalog.unavailable = true;

      await expect(run('-j')).resolves.toBe(ExitCode.OK);

      await expect(fs.access(path.join(stateDir, EXPORT_FILE))).resolves.toBeUndefined();
      const history = await loadHistory();
      expect(history.meta.size).toBe(0);
    });
  });
});
