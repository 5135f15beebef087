import assert from 'assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { AdbBridge, parseDevices, resolveAdbPath } from '../../../src/device-bridge/adb.ts';
import type { CommandResult, CommandRunner, RunOptions } from '../../../src/device-bridge/types.ts';
import type { Logger } from '../../../src/types.ts';

const logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
} as Logger;

interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions | undefined;
}

function createFakeRunner(result: Partial<CommandResult> = {}): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    return { exitCode: 0, stdout: '', stderr: '', ...result };
  };
  return { run, calls };
}

describe('device-bridge/adb', () => {
  describe('resolveAdbPath()', () => {
    it('takes the first PATH entry holding adb', () => {
      const env = { PATH: ['/usr/bin', '/opt/android/platform-tools'].join(path.delimiter) };

      const found = resolveAdbPath(env, (file) => file === path.join('/opt/android/platform-tools', 'adb'));

      assert.strictEqual(found, path.join('/opt/android/platform-tools', 'adb'));
    });

    it('falls back to the Homebrew locations', () => {
      assert.strictEqual(
        resolveAdbPath({ PATH: '/usr/bin' }, (file) => file === '/usr/local/bin/adb'),
        '/usr/local/bin/adb'
      );
    });

    it('returns null when adb is nowhere', () => {
      assert.strictEqual(
        resolveAdbPath({}, () => false),
        null
      );
    });
  });

  describe('parseDevices()', () => {
    it('reports the first ready device', () => {
      assert.deepStrictEqual(parseDevices('List of devices attached\nR58M123ABC\tdevice\nemulator-5554\tdevice\n'), { connected: true, info: 'R58M123ABC' });
    });

    it('explains an unauthorized device', () => {
      assert.deepStrictEqual(parseDevices('List of devices attached\nR58M123ABC\tunauthorized\n'), { connected: false, info: 'Device unauthorized - check your phone for USB debugging prompt' });
    });

    it('reports no device on an empty list', () => {
      assert.deepStrictEqual(parseDevices('List of devices attached\n\n'), { connected: false, info: 'No device connected' });
    });
  });

  describe('AdbBridge', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(path.join(tmpdir(), 'adb-test-'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('reports a missing adb without running anything', async () => {
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: null, logger, run });

      assert.deepStrictEqual(await bridge.status(), { connected: false, info: 'ADB not found' });
      assert.strictEqual(calls.length, 0);
    });

    it('reads status from adb devices', async () => {
      const { run, calls } = createFakeRunner({ stdout: 'List of devices attached\nSERIAL1\tdevice\n' });
      const bridge = new AdbBridge({ adbPath: '/usr/bin/adb', logger, run });

      assert.deepStrictEqual(await bridge.status(), { connected: true, info: 'SERIAL1' });
      assert.deepStrictEqual(calls, [{ command: '/usr/bin/adb', args: ['devices'], options: undefined }]);
    });

    it('pushes a local file into the default device folder', async () => {
      const localFile = path.join(testDir, 'movie.mkv');
      writeFileSync(localFile, 'frames');
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      assert.strictEqual(await bridge.push(localFile), true);
      assert.deepStrictEqual(calls, [{ command: 'adb', args: ['push', localFile, '/sdcard/Download/movie.mkv'], options: { inherit: true } }]);
    });

    it('pushes into a chosen device folder', async () => {
      const localFile = path.join(testDir, 'movie.mkv');
      writeFileSync(localFile, 'frames');
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      await bridge.push(localFile, '/sdcard/Movies/');

      assert.deepStrictEqual(calls[0]?.args, ['push', localFile, '/sdcard/Movies/movie.mkv']);
    });

    it('reports a failed push from the exit code', async () => {
      const localFile = path.join(testDir, 'movie.mkv');
      writeFileSync(localFile, 'frames');
      const { run } = createFakeRunner({ exitCode: 1 });
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      assert.strictEqual(await bridge.push(localFile), false);
    });

    it('refuses to push a missing file', async () => {
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      assert.strictEqual(await bridge.push(path.join(testDir, 'missing.mkv')), false);
      assert.strictEqual(calls.length, 0);
    });

    it('pulls into a directory under the remote basename', async () => {
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      assert.strictEqual(await bridge.pull('/sdcard/DCIM/Camera/photo.jpg', testDir), true);
      assert.deepStrictEqual(calls[0]?.args, ['pull', '/sdcard/DCIM/Camera/photo.jpg', path.join(testDir, 'photo.jpg')]);
    });

    it('pulls to an explicit file path', async () => {
      const { run, calls } = createFakeRunner();
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });
      const target = path.join(testDir, 'renamed.jpg');

      await bridge.pull('/sdcard/DCIM/Camera/photo.jpg', target);

      assert.deepStrictEqual(calls[0]?.args, ['pull', '/sdcard/DCIM/Camera/photo.jpg', target]);
    });

    it('lists a device folder', async () => {
      const { run, calls } = createFakeRunner({ stdout: 'total 0\n-rw-rw---- 1 root everybody 6 2024-05-01 10:00 photo.jpg\n' });
      const bridge = new AdbBridge({ adbPath: 'adb', logger, run });

      const listing = await bridge.list('/sdcard/DCIM/');

      assert.strictEqual(listing, 'total 0\n-rw-rw---- 1 root everybody 6 2024-05-01 10:00 photo.jpg\n');
      assert.deepStrictEqual(calls[0]?.args, ['shell', 'ls', '-la', '/sdcard/DCIM/']);
    });

    it('rejects transfers when adb is missing', async () => {
      const bridge = new AdbBridge({ adbPath: null, logger });

      await assert.rejects(bridge.list(), /ADB not found/);
    });
  });
});
