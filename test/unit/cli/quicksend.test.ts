import assert from 'assert';
import { runQuicksend, USAGE } from '../../../src/cli/quicksend.ts';
import type { DeviceBridge, DeviceStatus } from '../../../src/device-bridge/types.ts';

interface FakeBridge extends DeviceBridge {
  calls: string[];
}

function createFakeBridge(status: DeviceStatus, succeed = true): FakeBridge {
  const calls: string[] = [];
  return {
    calls,
    status: async () => status,
    push: async (localPath, remoteDestDir) => {
      calls.push(`push ${localPath} ${remoteDestDir}`);
      return succeed;
    },
    pull: async (remotePath, localDest) => {
      calls.push(`pull ${remotePath} ${localDest}`);
      return succeed;
    },
    list: async (remoteDir) => {
      calls.push(`list ${remoteDir}`);
      return 'photo.jpg';
    },
  };
}

const connected: DeviceStatus = { connected: true, info: 'SERIAL1' };
const disconnected: DeviceStatus = { connected: false, info: 'No device connected' };

describe('cli/quicksend', () => {
  let output: string[];
  const print = (message: string) => {
    output.push(message);
  };

  beforeEach(() => {
    output = [];
  });

  it('prints usage without a command', async () => {
    const exitCode = await runQuicksend([], { bridge: createFakeBridge(connected), print });

    assert.strictEqual(exitCode, 0);
    assert.deepStrictEqual(output, [USAGE]);
  });

  it('prints usage for an unknown command', async () => {
    const exitCode = await runQuicksend(['beam'], { bridge: createFakeBridge(connected), print });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(output, [USAGE]);
  });

  it('reports a connected device', async () => {
    const exitCode = await runQuicksend(['STATUS'], { bridge: createFakeBridge(connected), print });

    assert.strictEqual(exitCode, 0);
    assert.deepStrictEqual(output, ['✅ Device connected: SERIAL1']);
  });

  it('reports a missing device', async () => {
    const exitCode = await runQuicksend(['status'], { bridge: createFakeBridge(disconnected), print });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(output, ['❌ No device connected']);
  });

  it('sends to the default folder', async () => {
    const bridge = createFakeBridge(connected);

    const exitCode = await runQuicksend(['send', 'movie.mkv'], { bridge, print });

    assert.strictEqual(exitCode, 0);
    assert.deepStrictEqual(bridge.calls, ['push movie.mkv /sdcard/Download/']);
  });

  it('sends to a chosen folder', async () => {
    const bridge = createFakeBridge(connected);

    await runQuicksend(['send', 'movie.mkv', '/sdcard/Movies/'], { bridge, print });

    assert.deepStrictEqual(bridge.calls, ['push movie.mkv /sdcard/Movies/']);
  });

  it('returns 1 when a transfer fails', async () => {
    const exitCode = await runQuicksend(['get', '/sdcard/DCIM/photo.jpg'], { bridge: createFakeBridge(connected, false), print });

    assert.strictEqual(exitCode, 1);
  });

  it('gets into the current directory by default', async () => {
    const bridge = createFakeBridge(connected);

    await runQuicksend(['get', '/sdcard/DCIM/photo.jpg'], { bridge, print });

    assert.deepStrictEqual(bridge.calls, ['pull /sdcard/DCIM/photo.jpg .']);
  });

  it('asks for the file argument', async () => {
    const bridge = createFakeBridge(connected);

    const exitCode = await runQuicksend(['send'], { bridge, print });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(output, ['Usage: quicksend send <file> [destination]']);
    assert.deepStrictEqual(bridge.calls, []);
  });

  it('does not transfer without a device', async () => {
    const bridge = createFakeBridge(disconnected);

    const exitCode = await runQuicksend(['send', 'movie.mkv'], { bridge, print });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(output, ['❌ No device connected']);
    assert.deepStrictEqual(bridge.calls, []);
  });

  it('suggests installing adb when it is missing', async () => {
    const exitCode = await runQuicksend(['list'], { bridge: createFakeBridge({ connected: false, info: 'ADB not found' }), print });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(output, ['❌ ADB not found', '\nInstall it with Homebrew:\n  brew install android-platform-tools']);
  });

  it('lists the default folder', async () => {
    const bridge = createFakeBridge(connected);

    const exitCode = await runQuicksend(['list'], { bridge, print });

    assert.strictEqual(exitCode, 0);
    assert.deepStrictEqual(bridge.calls, ['list /sdcard/Download/']);
    assert.deepStrictEqual(output, ['📁 Files in /sdcard/Download/:\n', 'photo.jpg']);
  });
});
