import QRCode from 'qrcode';

const RULE = '='.repeat(50);

/**
 * Startup banner: the shared folder, the URL to open on the phone and a terminal QR
 * code of that URL.
 */
export async function renderBanner(url: string, sharedFolder: string): Promise<string> {
  const qr = await QRCode.toString(url, { type: 'terminal' });

  return [
    `\n${RULE}`,
    '  ⚡ QuickDrop - File Transfer Server',
    RULE,
    `\n  📁 Shared folder: ${sharedFolder}`,
    '\n  🌐 Open this URL on your phone:',
    `\n     ${url}`,
    '\n  📱 Or scan the QR code below:\n',
    qr,
    RULE,
    '  Press Ctrl+C to stop the server',
    `${RULE}\n`,
  ].join('\n');
}
