import { PlaylistResolver } from '../src/download/catalog/PlaylistResolver';
import { BitrateVariant } from '../src/download/core/types';
import { ResolutionError } from '../src/download/core/errors';
import { FakeCatalog, makeTrack } from './helpers/fakes';

const { LOW, MID } = BitrateVariant;

describe('PlaylistResolver', () => {
  it('should keep catalog order', async () => {
    const catalog = new FakeCatalog({ '1': [makeTrack('30', [LOW]), makeTrack('10', [MID]), makeTrack('20', [])] });

    const tracks = await new PlaylistResolver(catalog).resolve('1');

    expect(tracks.map((track) => track.id)).toEqual(['30', '10', '20']);
  });

  it('should keep only the first occurrence of a repeated track', async () => {
    const catalog = new FakeCatalog({
      '1': [makeTrack('5', [LOW]), makeTrack('6', [LOW]), makeTrack('5', [MID], 'Again')],
    });

    const tracks = await new PlaylistResolver(catalog).resolve('1');

    expect(tracks.map((track) => [track.id, track.name])).toEqual([
      ['5', 'Song 5'],
      ['6', 'Song 6'],
    ]);
  });

  it('should return an empty list for an empty playlist', async () => {
    const catalog = new FakeCatalog({ '1': [] });

    await expect(new PlaylistResolver(catalog).resolve('1')).resolves.toEqual([]);
  });

  it('should propagate resolution errors', async () => {
    const catalog = new FakeCatalog({});

    await expect(new PlaylistResolver(catalog).resolve('77')).rejects.toBeInstanceOf(ResolutionError);
    expect(catalog.playlistCalls).toEqual(['77']);
  });
});
