import { DEFAULT_DEVICE_DIR } from '../device-bridge/adb.ts';
import type { DeviceBridge } from '../device-bridge/types.ts';

export const USAGE = `QuickSend - USB File Transfer

USAGE:
  quicksend send <file>           Send file to Android
  quicksend send <file> <dest>    Send to specific folder
  quicksend get <android_path>    Download from Android
  quicksend list [path]           List files on Android
  quicksend status                Check connection

EXAMPLES:
  quicksend send ~/Downloads/movie.mkv
  quicksend send movie.mkv /sdcard/Movies/
  quicksend get /sdcard/DCIM/Camera/photo.jpg
  quicksend list /sdcard/DCIM/Camera/

DEFAULT ANDROID FOLDER: ${DEFAULT_DEVICE_DIR}`;

export interface QuicksendContext {
  bridge: DeviceBridge;
  print: (message: string) => void;
}

/**
 * Run one quicksend command and return the process exit code.
 *
 * @param argv - Arguments after the program name, e.g. `['send', 'movie.mkv']`
 */
export async function runQuicksend(argv: string[], context: QuicksendContext): Promise<number> {
  const { bridge, print } = context;
  const [rawCommand, first, second] = argv;
  const command = rawCommand?.toLowerCase();

  if (command !== 'status' && command !== 'send' && command !== 'get' && command !== 'list') {
    print(USAGE);
    return command === undefined ? 0 : 1;
  }

  const { connected, info } = await bridge.status();

  if (command === 'status') {
    print(connected ? `✅ Device connected: ${info}` : `❌ ${info}`);
    return connected ? 0 : 1;
  }

  if ((command === 'send' || command === 'get') && !first) {
    print(command === 'send' ? 'Usage: quicksend send <file> [destination]' : 'Usage: quicksend get <android_path> [local_dest]');
    return 1;
  }

  if (!connected) {
    print(`❌ ${info}`);
    if (info === 'ADB not found') print('\nInstall it with Homebrew:\n  brew install android-platform-tools');
    return 1;
  }

  switch (command) {
    case 'send':
      return (await bridge.push(first ?? '', second ?? DEFAULT_DEVICE_DIR)) ? 0 : 1;
    case 'get':
      return (await bridge.pull(first ?? '', second ?? '.')) ? 0 : 1;
    case 'list': {
      const dir = first ?? DEFAULT_DEVICE_DIR;
      print(`📁 Files in ${dir}:\n`);
      print(await bridge.list(dir));
      return 0;
    }
  }
}
