#!/usr/bin/env tsx
/**
 * QuickSend - USB file transfer with an Android device through adb
 *
 * USAGE: tsx src/bin/quicksend.ts <send|get|list|status> [args]
 */

import { runQuicksend } from '../cli/quicksend.ts';
import { AdbBridge, resolveAdbPath } from '../device-bridge/adb.ts';

const bridge = new AdbBridge({ adbPath: resolveAdbPath(process.env), logger: console });

runQuicksend(process.argv.slice(2), { bridge, print: (message) => console.log(message) })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
