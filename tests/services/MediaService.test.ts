import { describe, it, expect, afterEach } from '@jest/globals';
import type { CredentialEnvironment } from '../../src/config/types.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { BatchError, ExtractionError, SearchError, VideoUnavailableError } from '../../src/errors/index.js';
import { MediaService } from '../../src/services/MediaService.js';
import { ExtractionClient } from '../../src/services/extraction/ExtractionClient.js';
import type { ExtractionRequest, RawOutput } from '../../src/services/extraction/Extractor.js';
import { ExtractionPool } from '../../src/services/extraction/ExtractionPool.js';
import { ScriptedExtractor, videoDocument } from '../utils/fakes.js';

const URL = 'https://www.youtube.com/watch?v=abcdefghijk';

function setup(
  respond: (request: ExtractionRequest) => Partial<RawOutput>,
  credentials: CredentialEnvironment = { global: {}, platforms: {} }
) {
  const local = new ScriptedExtractor('local', respond);
  const remoteHosts: string[] = [];
  const client = new ExtractionClient({
    local,
    remote: host => {
      remoteHosts.push(host);
      return local;
    },
    socketTimeoutSeconds: 30,
  });
  const media = new MediaService({
    client,
    pool: new ExtractionPool(4),
    credentials,
    timeouts: defaultConfig.extraction.timeouts,
    cache: { ttlMs: 60_000 },
    playlistMaxVideos: 50,
  });
  return { media, local, remoteHosts };
}

describe('MediaService', () => {
  let media: MediaService | undefined;

  afterEach(() => {
    media?.close();
  });

  it('serves repeated calls from the cache with an identical payload', async () => {
    const setupResult = setup(() => ({ stdout: videoDocument('abcdefghijk') }));
    media = setupResult.media;

    const first = await media.getVideoInfo(URL);
    const second = await media.getVideoInfo('https://youtu.be/abcdefghijk');

    expect(second).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(setupResult.local.requests).toHaveLength(1);
    expect(media.cacheStats()).toEqual({ entries: 1, ttlMs: 60_000 });
  });

  it('does not cache failures', async () => {
    let attempt = 0;
    const setupResult = setup(() => {
      attempt++;
      return attempt === 1
        ? { exitCode: 1, stderr: 'ERROR: [youtube] abcdefghijk: Private video' }
        : { stdout: videoDocument('abcdefghijk') };
    });
    media = setupResult.media;

    await expect(media.getVideoInfo(URL)).rejects.toBeInstanceOf(VideoUnavailableError);
    await expect(media.getVideoInfo(URL)).resolves.toMatchObject({ id: 'abcdefghijk' });
    expect(setupResult.local.requests).toHaveLength(2);
  });

  it('routes platforms with a remote host through it', async () => {
    const setupResult = setup(() => ({ stdout: videoDocument('7300000000000000001') }), {
      global: {},
      platforms: { douyin: { remoteHost: 'cn-host' } },
    });
    media = setupResult.media;

    await media.getVideoInfo('https://www.douyin.com/video/7300000000000000001');

    expect(setupResult.remoteHosts).toEqual(['cn-host']);
    expect(setupResult.local.requests[0]?.target).toBe('https://www.douyin.com/video/7300000000000000001');
  });

  it('caches searches case-insensitively', async () => {
    const setupResult = setup(() => ({ stdout: JSON.stringify({ entries: [{ id: 'x1', title: 'One' }] }) }));
    media = setupResult.media;

    await media.searchVideos('LoFi', 5);
    await media.searchVideos('lofi', 5);

    expect(setupResult.local.requests).toHaveLength(1);
    expect(setupResult.local.requests[0]?.target).toBe('ytsearch5:LoFi');
  });

  it('validates search input before extracting', async () => {
    const setupResult = setup(() => ({}));
    media = setupResult.media;

    await expect(media.searchVideos('   ', 5)).rejects.toThrow(
      new SearchError('Search query must be a non-empty string')
    );
    await expect(media.searchVideos('lofi', 21)).rejects.toThrow('max_results must be an integer between 1 and 20');
    expect(setupResult.local.requests).toHaveLength(0);
  });

  it('validates transcript and audio options', async () => {
    const setupResult = setup(() => ({}));
    media = setupResult.media;

    await expect(media.getTranscript(URL, ' ', 'text')).rejects.toThrow(
      new ExtractionError('lang must be a non-empty language code')
    );
    await expect(media.getTranscript('https://example.com/v', 'en', 'text')).rejects.toThrow(
      'Unsupported or invalid URL: https://example.com/v'
    );
  });

  it('bounds the playlist size', async () => {
    const setupResult = setup(() => ({}));
    media = setupResult.media;

    await expect(media.getPlaylistInfo('https://www.youtube.com/playlist?list=PL1', 51)).rejects.toThrow(
      new BatchError('max_videos must be an integer between 1 and 50')
    );
  });

  it('returns the audio stream for the requested quality', async () => {
    const setupResult = setup(() => ({
      stdout: videoDocument('abcdefghijk', {
        formats: [
          { format_id: '140', ext: 'm4a', acodec: 'mp4a', vcodec: 'none', abr: 128, url: 'https://cdn.test/140', filesize: 900 },
          { format_id: '139', ext: 'm4a', acodec: 'mp4a', vcodec: 'none', abr: 48, url: 'https://cdn.test/139', filesize: 300 },
        ],
      }),
    }));
    media = setupResult.media;

    const best = await media.getAudioUrl(URL, 'best');
    const smallest = await media.getAudioUrl(URL, 'smallest');

    expect(best.format.url).toBe('https://cdn.test/140');
    expect(smallest.format.url).toBe('https://cdn.test/139');
    expect(setupResult.local.requests).toHaveLength(2);
  });
});
