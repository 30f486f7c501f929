import { describe, it, expect } from '@jest/globals';
import { ExtractionCancelledError, ExtractionTimeoutError, SSHError } from '../../src/errors/index.js';
import { ExtractionClient } from '../../src/services/extraction/ExtractionClient.js';
import { RemoteExtractor } from '../../src/services/extraction/Extractor.js';
import type { ProcessOptions, ProcessResult } from '../../src/services/process/runProcess.js';
import {
  buildReleaseScript,
  buildRemoteScript,
  RemoteExecutionBridge,
  shellQuote,
  splitStreamedFiles,
} from '../../src/services/remote/RemoteExecutionBridge.js';
import { fakeRunner, platformConfig, ScriptedExtractor, videoDocument } from '../utils/fakes.js';

const HOST = 'extract-host';
const URL = 'https://www.youtube.com/watch?v=abcdefghijk';
const SSH_PREFIX = ['-T', '-o', 'BatchMode=yes', '-o', 'ConnectTimeout=10', HOST];

type MainHandler = (script: string, options: ProcessOptions) => Partial<ProcessResult>;

function remoteSetup(main: MainHandler, mktemp: Partial<ProcessResult> = { stdout: '/tmp/tmp.x1\n' }) {
  const { runner, calls } = fakeRunner((_command, args, options) => {
    const script = args[args.length - 1] ?? '';
    if (script === 'mktemp -d') return mktemp;
    if (script.startsWith('rm -rf') || script.startsWith('kill ')) return {};
    return main(script, options);
  });
  const bridge = new RemoteExecutionBridge({
    sshPath: 'ssh',
    remoteBinaryPath: '/usr/local/bin/yt-dlp',
    connectTimeoutSeconds: 10,
    runner,
    now: () => 0,
  });
  const client = new ExtractionClient({
    local: new ScriptedExtractor('local', () => {
      throw new Error('local extractor must not run');
    }),
    remote: host => new RemoteExtractor(host, bridge),
    socketTimeoutSeconds: 30,
  });
  return { bridge, client, calls };
}

describe('RemoteExecutionBridge', () => {
  it('cleans up the remote directory after a timeout and reports an ExtractionError', async () => {
    const { client, calls } = remoteSetup(() => ({ exitCode: null, signal: 'SIGTERM', timedOut: true }));

    const result = await client.extract(
      'video_info',
      { url: URL, platform: 'youtube' },
      platformConfig({ remoteHost: HOST }),
      1_000
    );

    expect(result).toMatchObject({ success: false, kind: 'ExtractionError', message: 'Extraction timed out after 1000ms' });
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ExtractionTimeoutError);
    }
    expect(calls).toHaveLength(3);
    expect(calls[0]?.args).toEqual([...SSH_PREFIX, 'mktemp -d']);
    expect(calls[0]?.options.timeoutMs).toBe(1_000);
    expect(calls[2]?.command).toBe('ssh');
    expect(calls[2]?.args).toEqual([
      ...SSH_PREFIX,
      `kill -TERM "$(cat '/tmp/tmp.x1/.mediascope.pid' 2>/dev/null)" 2>/dev/null; rm -rf -- '/tmp/tmp.x1'`,
    ]);
    expect(calls[2]?.options).toEqual({ timeoutMs: 15_000 });
  });

  it('treats an expired remote deadline as a timeout', async () => {
    const { bridge, calls } = remoteSetup(() => ({ exitCode: 124, stderr: '' }));

    const output = await bridge.runRemote(HOST, () => ['-J', '--', URL], { timeoutMs: 2_500, collect: [] });

    expect(output.timedOut).toBe(true);
    expect(output.aborted).toBe(false);
    expect(calls[1]?.args[calls[1].args.length - 1]).toBe(
      `cd '/tmp/tmp.x1' && { timeout -k 5 3 '/usr/local/bin/yt-dlp' '-J' '--' '${URL}' & echo $! > '.mediascope.pid'; wait $!; }`
    );
    expect(calls[2]?.args[calls[2].args.length - 1]).toBe(
      `kill -TERM "$(cat '/tmp/tmp.x1/.mediascope.pid' 2>/dev/null)" 2>/dev/null; rm -rf -- '/tmp/tmp.x1'`
    );
  });

  it('terminates the remote extractor when the caller cancels', async () => {
    const { bridge, calls } = remoteSetup(() => ({ exitCode: null, signal: 'SIGTERM', aborted: true }));

    const output = await bridge.runRemote(HOST, () => ['-J', '--', URL], { timeoutMs: 1_000, collect: [] });

    expect(output.aborted).toBe(true);
    expect(calls[2]?.args[calls[2].args.length - 1]).toBe(
      `kill -TERM "$(cat '/tmp/tmp.x1/.mediascope.pid' 2>/dev/null)" 2>/dev/null; rm -rf -- '/tmp/tmp.x1'`
    );
  });

  it('runs the extractor inside the acquired directory', async () => {
    const { client, calls } = remoteSetup(() => ({ stdout: videoDocument('abcdefghijk') }));

    const result = await client.extract(
      'video_info',
      { url: URL, platform: 'youtube' },
      platformConfig({ remoteHost: HOST }),
      1_000
    );

    expect(result.success).toBe(true);
    expect(calls[1]?.args).toEqual([
      ...SSH_PREFIX,
      "cd '/tmp/tmp.x1' && { timeout -k 5 1 '/usr/local/bin/yt-dlp' '-J' '--no-warnings' '--no-progress' '--no-playlist' " +
        `'--socket-timeout' '30' '--paths' '/tmp/tmp.x1' '--' '${URL}' & echo $! > '.mediascope.pid'; wait $!; }`,
    ]);
    expect(calls[1]?.options).toEqual({ timeoutMs: 1_000 });
  });

  it('raises SSHError on transport failure and still cleans up', async () => {
    const { bridge, calls } = remoteSetup(() => ({ exitCode: 255, stderr: 'ssh: connect to host extract-host: Connection refused\n' }));

    await expect(bridge.runRemote(HOST, () => ['-J', '--', URL], { timeoutMs: 1_000, collect: [] })).rejects.toThrow(
      new SSHError(HOST, 'ssh to extract-host failed: ssh: connect to host extract-host: Connection refused')
    );
    expect(calls[2]?.args[calls[2].args.length - 1]).toBe("rm -rf -- '/tmp/tmp.x1'");
  });

  it('surfaces a transport failure through the client as SSHError', async () => {
    const { client } = remoteSetup(() => ({ exitCode: 255, stderr: 'Permission denied (publickey).' }));

    const result = await client.extract(
      'video_info',
      { url: URL, platform: 'youtube' },
      platformConfig({ remoteHost: HOST }),
      1_000
    );

    expect(result).toMatchObject({
      success: false,
      kind: 'SSHError',
      message: 'ssh to extract-host failed: Permission denied (publickey).',
    });
  });

  it('fails without cleanup when the directory cannot be created', async () => {
    const { bridge, calls } = remoteSetup(() => ({}), { exitCode: 255, stderr: 'Permission denied (publickey).' });

    await expect(bridge.runRemote(HOST, () => [], { timeoutMs: 1_000, collect: [] })).rejects.toThrow(
      'Could not create a remote temp directory on extract-host: Permission denied (publickey).'
    );
    expect(calls).toHaveLength(1);
  });

  it('reports a cancelled acquisition as a cancellation', async () => {
    const { bridge } = remoteSetup(() => ({}), { exitCode: null, aborted: true });

    await expect(bridge.runRemote(HOST, () => [], { timeoutMs: 1_000, collect: [] })).rejects.toBeInstanceOf(
      ExtractionCancelledError
    );
  });

  it('rejects hosts that look like options', async () => {
    const { bridge, calls } = remoteSetup(() => ({}));

    await expect(bridge.runRemote('-oProxyCommand=x', () => [], { timeoutMs: 1_000, collect: [] })).rejects.toBeInstanceOf(
      SSHError
    );
    expect(calls).toHaveLength(0);
  });

  it('returns streamed subtitle files separately from stdout', async () => {
    const { bridge } = remoteSetup(() => ({
      stdout: '{"id":"a"}\n\n__MEDIASCOPE_FILE__ a.en.vtt\nWEBVTT\n\ncue\n',
    }));

    const output = await bridge.runRemote(HOST, () => ['-J', '--', URL], { timeoutMs: 1_000, collect: ['.vtt'] });

    expect(output.stdout).toBe('{"id":"a"}\n');
    expect(output.files).toEqual([{ name: 'a.en.vtt', content: 'WEBVTT\n\ncue\n' }]);
    expect(output.exitCode).toBe(0);
  });
});

describe('remote script helpers', () => {
  it('quotes single quotes for the shell', () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
  });

  it('bounds the command by the remote deadline without files to collect', () => {
    expect(buildRemoteScript('/tmp/x', ['yt-dlp', '-J', '--', 'u'], [], 30)).toBe(
      "cd '/tmp/x' && { timeout -k 5 30 'yt-dlp' '-J' '--' 'u' & echo $! > '.mediascope.pid'; wait $!; }"
    );
  });

  it('never gives the remote deadline less than a second', () => {
    expect(buildRemoteScript('/tmp/x', ['yt-dlp'], [], 0)).toBe(
      "cd '/tmp/x' && { timeout -k 5 1 'yt-dlp' & echo $! > '.mediascope.pid'; wait $!; }"
    );
  });

  it('streams matching files after the command and keeps its exit status', () => {
    expect(buildRemoteScript('/tmp/x', ['yt-dlp'], ['.vtt', '.srt'], 10)).toBe(
      "cd '/tmp/x' && { timeout -k 5 10 'yt-dlp' & echo $! > '.mediascope.pid'; wait $!; }; rc=$?; " +
        "for f in *.vtt *.srt; do [ -f \"$f\" ] || continue; " +
        "printf '\\n%s %s\\n' '__MEDIASCOPE_FILE__' \"$f\"; cat -- \"$f\"; done; exit $rc"
    );
  });

  it('only kills the extractor on cleanup after an interrupted run', () => {
    expect(buildReleaseScript('/tmp/x', false)).toBe("rm -rf -- '/tmp/x'");
    expect(buildReleaseScript('/tmp/x', true)).toBe(
      `kill -TERM "$(cat '/tmp/x/.mediascope.pid' 2>/dev/null)" 2>/dev/null; rm -rf -- '/tmp/x'`
    );
  });

  it('splits several streamed files', () => {
    expect(splitStreamedFiles('out\n__MEDIASCOPE_FILE__ a.vtt\nA\n__MEDIASCOPE_FILE__ b.srt\nB')).toEqual({
      stdout: 'out',
      files: [
        { name: 'a.vtt', content: 'A' },
        { name: 'b.srt', content: 'B' },
      ],
    });
  });
});
