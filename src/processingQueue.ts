import { describeError } from './errors.js';
import logger from './logger.js';

type QueuedTask = () => Promise<void>;

/**
 * Runs tasks strictly one after another, in submission order. A task starts
 * only after the previous one settled, so no two tasks ever interleave.
 */
export class ProcessingQueue {
    queue: QueuedTask[];
    processing: boolean;

    constructor(private readonly name = 'queue') {
        this.queue = [];
        this.processing = false;
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.queue.push(async () => {
                try {
                    resolve(await task());
                } catch (err) {
                    logger.debug(`[${this.name}] Task failed: ${describeError(err)}`);
                    reject(err);
                }
            });
            if (!this.processing) {
                this.processing = true;
                void this.execute();
            }
        });
    }

    private async execute(): Promise<void> {
        let next = this.queue.shift();
        while (next) {
            await next();
            next = this.queue.shift();
        }
        this.processing = false;
    }
}

export default ProcessingQueue;
