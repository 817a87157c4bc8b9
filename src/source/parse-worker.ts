import { parentPort } from 'node:worker_threads';
import { handleParseRequest, type ParseRequest } from './html-parser.js';

if (!parentPort) {
  throw new Error('parse-worker must run inside a worker thread');
}

const port = parentPort;

port.on('message', (request: ParseRequest) => {
  port.postMessage(handleParseRequest(request));
});
