import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect } from '@jest/globals';
import { LocalProcessExtractor } from '../../src/services/extraction/Extractor.js';
import { fakeRunner } from '../utils/fakes.js';

function pathsArg(args: string[]): string {
  const index = args.indexOf('--paths');
  const dir = args[index + 1];
  if (index === -1 || !dir) {
    throw new Error('--paths missing');
  }
  return dir;
}

describe('LocalProcessExtractor', () => {
  it('runs the binary with the built arguments', async () => {
    const { runner, calls } = fakeRunner(() => ({ stdout: '{"id":"x"}' }));
    const extractor = new LocalProcessExtractor('/opt/yt-dlp', runner);

    const output = await extractor.extract(
      { target: 'https://youtu.be/abcdefghijk', options: { dump: 'single', noPlaylist: true } },
      { timeoutMs: 2_000 }
    );

    expect(calls).toEqual([
      {
        command: '/opt/yt-dlp',
        args: ['-J', '--no-warnings', '--no-progress', '--no-playlist', '--', 'https://youtu.be/abcdefghijk'],
        options: { timeoutMs: 2_000 },
      },
    ]);
    expect(output).toEqual({ stdout: '{"id":"x"}', stderr: '', exitCode: 0, timedOut: false, aborted: false, files: [] });
  });

  it('collects written subtitle files and removes the temp directory', async () => {
    let workDir = '';
    const { runner } = fakeRunner(async (_command, args) => {
      workDir = pathsArg(args);
      await fs.writeFile(path.join(workDir, 'abc.en.vtt'), 'WEBVTT\n');
      await fs.writeFile(path.join(workDir, 'abc.de.srt'), '1\n');
      await fs.writeFile(path.join(workDir, 'abc.info.json'), '{}');
      return { stdout: '{}' };
    });
    const extractor = new LocalProcessExtractor('yt-dlp', runner);

    const output = await extractor.extract(
      { target: 'u', options: { dump: 'single', writeSubtitles: true }, collect: ['.vtt', '.srt'] },
      { timeoutMs: 2_000 }
    );

    expect(output.files).toEqual([
      { name: 'abc.de.srt', content: '1\n' },
      { name: 'abc.en.vtt', content: 'WEBVTT\n' },
    ]);
    expect(await fs.pathExists(workDir)).toBe(false);
  });

  it('removes the temp directory when the runner fails', async () => {
    let workDir = '';
    const { runner } = fakeRunner((_command, args) => {
      workDir = pathsArg(args);
      throw new Error('spawn yt-dlp ENOENT');
    });
    const extractor = new LocalProcessExtractor('yt-dlp', runner);

    await expect(
      extractor.extract({ target: 'u', options: { dump: 'single' }, collect: ['.vtt'] }, { timeoutMs: 2_000 })
    ).rejects.toThrow('spawn yt-dlp ENOENT');
    expect(workDir).not.toBe('');
    expect(await fs.pathExists(workDir)).toBe(false);
  });
});
