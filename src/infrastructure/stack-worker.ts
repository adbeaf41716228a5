// Worker thread entry: loads one selected file per request.
import { parentPort } from 'worker_threads';
import { isLoadFileTask, loadSourceFile } from '@etl/load-source-file';
import { WorkerReply, isWorkerRequest, serializeError } from './worker-protocol';

const channel = parentPort;
if (!channel) {
  throw new Error('stack-worker must be started as a worker thread');
}

function reply(message: WorkerReply): void {
  channel?.postMessage(message);
}

async function handle(message: unknown): Promise<void> {
  if (!isWorkerRequest(message, isLoadFileTask)) {
    // No task id to answer with; exiting rejects the pending task
    throw new Error('stack-worker received a malformed request');
  }
  try {
    const result = await loadSourceFile(message.task);
    reply({ id: message.id, ok: true, result });
  } catch (error) {
    reply({ id: message.id, ok: false, error: serializeError(error) });
  }
}

channel.on('message', (message: unknown) => {
  handle(message).catch((error: unknown) => {
    console.error('stack-worker:', error);
    process.exit(1);
  });
});
