import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import fetch, { Response } from 'node-fetch';
import { HttpFileTransfer } from '../src/download/transfer/HttpFileTransfer';
import { BitrateVariant, TrackRef } from '../src/download/core/types';
import { TransferError } from '../src/download/core/errors';
import { makeTempDir, offer, removeDir } from './helpers/fakes';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);

const streamResponse = (content: string, status: number = 200) =>
  new Response(Readable.from([Buffer.from(content)]), { status });

const track: TrackRef = { id: '1', name: 'Song 1', artist: 'Test Artist', album: 'Test Album' };

describe('HttpFileTransfer', () => {
  let outputDir: string;
  let transfer: HttpFileTransfer;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    transfer = new HttpFileTransfer({ outputDirectory: outputDir, timeout: 5000 });
    mockedFetch.mockReset();
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it('should write the variant to "<artist> - <name>.<ext>"', async () => {
    mockedFetch.mockResolvedValueOnce(streamResponse('hello world'));

    const result = await transfer.transfer(track, offer(BitrateVariant.MID, '1'));

    const expected = path.join(outputDir, 'Test Artist - Song 1.mp3');
    expect(result).toEqual({ filePath: expected, filesize: 11 });
    expect(await fs.readFile(expected, 'utf-8')).toBe('hello world');
    expect(await fs.readdir(outputDir)).toEqual(['Test Artist - Song 1.mp3']);
    expect(mockedFetch.mock.calls[0][0]).toBe('http://media.test/1/mid.mp3');
  });

  it('should replace path separators in track names', async () => {
    mockedFetch.mockResolvedValueOnce(streamResponse('x'));

    const result = await transfer.transfer({ ...track, name: 'A/B' }, offer(BitrateVariant.LOW, '1'));

    expect(result.filePath).toBe(path.join(outputDir, 'Test Artist - A_B.mp3'));
  });

  it('should fail on an HTTP error and leave nothing behind', async () => {
    mockedFetch.mockResolvedValueOnce(streamResponse('missing', 404));

    const attempt = transfer.transfer(track, offer(BitrateVariant.MID, '1'));

    await expect(attempt).rejects.toBeInstanceOf(TransferError);
    await expect(attempt).rejects.toThrow('HTTP 404');
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('should reject a body whose size differs from the offer', async () => {
    mockedFetch.mockResolvedValueOnce(streamResponse('hello world'));

    await expect(
      transfer.transfer(track, { ...offer(BitrateVariant.MID, '1'), size: 5 }),
    ).rejects.toThrow('Expected 5 bytes, got 11');
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('should wrap network failures with the track id', async () => {
    mockedFetch.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(transfer.transfer(track, offer(BitrateVariant.MID, '1'))).rejects.toMatchObject({
      trackId: '1',
      message: 'socket hang up',
    });
  });

  it('should keep both files when two tracks share artist and title', async () => {
    mockedFetch
      .mockResolvedValueOnce(streamResponse('track-one'))
      .mockResolvedValueOnce(streamResponse('track-two'));
    const intro = (id: string): TrackRef => ({ id, name: 'Intro', artist: 'X', album: `Album ${id}` });

    const first = await transfer.transfer(intro('1'), offer(BitrateVariant.MID, '1'));
    const second = await transfer.transfer(intro('2'), offer(BitrateVariant.MID, '2'));

    expect(first.filePath).toBe(path.join(outputDir, 'X - Intro.mp3'));
    expect(second.filePath).toBe(path.join(outputDir, 'X - Intro (2).mp3'));
    expect(await fs.readFile(first.filePath, 'utf-8')).toBe('track-one');
    expect(await fs.readFile(second.filePath, 'utf-8')).toBe('track-two');
  });

  it('should not overwrite a file already in the output directory', async () => {
    await fs.writeFile(path.join(outputDir, 'Test Artist - Song 1.mp3'), 'from an earlier run');
    mockedFetch.mockResolvedValueOnce(streamResponse('fresh'));

    const result = await transfer.transfer(track, offer(BitrateVariant.HIGH, '1'));

    expect(result.filePath).toBe(path.join(outputDir, 'Test Artist - Song 1 (1).mp3'));
    expect(await fs.readFile(path.join(outputDir, 'Test Artist - Song 1.mp3'), 'utf-8')).toBe('from an earlier run');
  });

  it('should replace its own file when the same track is fetched again', async () => {
    mockedFetch.mockResolvedValueOnce(streamResponse('mid')).mockResolvedValueOnce(streamResponse('high'));

    const first = await transfer.transfer(track, offer(BitrateVariant.MID, '1'));
    const second = await transfer.transfer(track, offer(BitrateVariant.HIGH, '1'));

    expect(second.filePath).toBe(first.filePath);
    expect(await fs.readFile(second.filePath, 'utf-8')).toBe('high');
    expect(await fs.readdir(outputDir)).toEqual(['Test Artist - Song 1.mp3']);
  });

  it('should close the response body when the file cannot be written', async () => {
    const source = new Readable({ read() {} });
    source.push(Buffer.from('partial'));
    mockedFetch.mockResolvedValueOnce(new Response(source));
    const broken = new HttpFileTransfer({ outputDirectory: path.join(outputDir, 'missing'), timeout: 5000 });

    await expect(broken.transfer(track, offer(BitrateVariant.MID, '1'))).rejects.toBeInstanceOf(TransferError);
    expect(source.destroyed).toBe(true);
  });
});
