import { workerData } from 'worker_threads';
import { runLoopWorker } from './loop-body.js';

await runLoopWorker(workerData);
