import { parentPort } from 'node:worker_threads';

import { type BlockScanRequest, handleScanFrame } from './block-scan.protocol.js';

if (!parentPort) {
  throw new Error('Block scan worker must be spawned as a worker thread');
}

parentPort.on('message', (message: BlockScanRequest) => {
  if (message.type === 'shutdown') {
    parentPort?.close();
    return;
  }

  parentPort?.postMessage(handleScanFrame(message));
});
