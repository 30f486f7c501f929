/**
 * Options understood by the extractor, independent of where it runs
 */
export interface ExtractorOptions {
  /** `single` prints one JSON document (-J), `lines` one per video (-j) */
  dump: 'single' | 'lines';
  flatPlaylist?: boolean;
  noPlaylist?: boolean;
  playlistEnd?: number;
  writeSubtitles?: boolean;
  writeAutoSubtitles?: boolean;
  subtitleLanguages?: string[];
  subtitleFormat?: string;
  outputTemplate?: string;
  proxy?: string | null;
  cookieFile?: string | null;
  cookieSource?: string | null;
  socketTimeoutSeconds?: number;
}

/**
 * Build yt-dlp argv (without the binary). `workDir` becomes `--paths`, so
 * any written files land there.
 */
export function buildYtDlpArgs(target: string, options: ExtractorOptions, workDir?: string): string[] {
  const args: string[] = [options.dump === 'single' ? '-J' : '-j', '--no-warnings', '--no-progress'];

  if (options.flatPlaylist) args.push('--flat-playlist');
  if (options.noPlaylist) args.push('--no-playlist');
  if (options.playlistEnd !== undefined) args.push('--playlist-end', String(options.playlistEnd));

  if (options.writeSubtitles || options.writeAutoSubtitles) {
    // -J implies --simulate; subtitles are only written with --no-simulate
    args.push('--skip-download', '--no-simulate');
    if (options.writeSubtitles) args.push('--write-subs');
    if (options.writeAutoSubtitles) args.push('--write-auto-subs');
    if (options.subtitleLanguages && options.subtitleLanguages.length > 0) {
      args.push('--sub-langs', options.subtitleLanguages.join(','));
    }
    if (options.subtitleFormat) args.push('--sub-format', options.subtitleFormat);
  }

  if (options.proxy) args.push('--proxy', options.proxy);
  if (options.cookieFile) {
    args.push('--cookies', options.cookieFile);
  } else if (options.cookieSource) {
    args.push('--cookies-from-browser', options.cookieSource);
  }
  if (options.socketTimeoutSeconds !== undefined) {
    args.push('--socket-timeout', String(options.socketTimeoutSeconds));
  }

  if (workDir) args.push('--paths', workDir);
  if (options.outputTemplate) args.push('--output', options.outputTemplate);

  // Target after `--` so a value starting with "-" is never read as an option
  args.push('--', target);
  return args;
}
