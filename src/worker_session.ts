/**
 * Worker Session — broadcast one node task to every rank of a multi-worker build.
 *
 * ThreadWorkerSession runs each rank in a worker_thread with a hard-kill
 * timeout; ranks share a barrier in a SharedArrayBuffer. InProcessWorkerSession
 * runs the ranks one after another in the calling thread, so rank 0 always
 * finishes before rank 1 starts and the barrier has nothing to wait for.
 *
 * A node task is named by module path and export so a worker thread can load
 * it: the export is called as `fn(payload, context)` and its return value
 * must survive structured clone.
 */

import * as path from 'path';
import { Worker } from 'worker_threads';
import { TIMEOUTS } from './config';
import { isRecord } from './engine_config';
import { Logger, createLogger } from './logger';
import { InvalidOptionError, WorkerSessionError, describeError } from './structured_error';

const defaultLog = createLogger('worker-session');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface WorkerContext {
    rank: number;
    world_size: number;
    /** Blocks until every rank has reached it. */
    barrier(): void;
}

export type NodeTaskFn<P, R> = (payload: P, context: WorkerContext) => R | Promise<R>;

export interface NodeTask<P, R> {
    /** Absolute path of a CommonJS module (or one the active loader can require). */
    modulePath: string;
    exportName: string;
    /** Validates what a rank returned. Throws on a malformed result. */
    parseResult: (raw: unknown) => R;
}

export interface WorkerSession {
    readonly worldSize: number;
    /** Runs the task on every rank and returns the results ordered by rank. */
    submitSync<P, R>(task: NodeTask<P, R>, payload: P): Promise<R[]>;
}

function checkWorldSize(worldSize: number): void {
    if (!Number.isInteger(worldSize) || worldSize < 1) {
        throw new InvalidOptionError(`world size must be a positive integer, got ${worldSize}`);
    }
}

function parseOrFail<R>(task: NodeTask<unknown, R>, raw: unknown, rank: number): R {
    try {
        return task.parseResult(raw);
    } catch (e) {
        throw new WorkerSessionError(
            `Rank ${rank} returned a malformed result: ${describeError(e)}`,
            'WORKER_TASK_FAILED',
            rank,
            e
        );
    }
}

/* -------------------------------------------------------------------------- */
/* In-process                                                                 */
/* -------------------------------------------------------------------------- */

export class InProcessWorkerSession implements WorkerSession {
    constructor(readonly worldSize: number, private readonly log: Logger = defaultLog) {
        checkWorldSize(worldSize);
    }

    async submitSync<P, R>(task: NodeTask<P, R>, payload: P): Promise<R[]> {
        const mod: unknown = await import(path.resolve(task.modulePath));
        const fn = isRecord(mod) ? mod[task.exportName] : undefined;
        if (typeof fn !== 'function') {
            throw new InvalidOptionError(`Node task export not found: ${task.exportName} in ${task.modulePath}`);
        }

        const results: R[] = [];
        for (let rank = 0; rank < this.worldSize; rank++) {
            const context: WorkerContext = { rank, world_size: this.worldSize, barrier: () => undefined };
            this.log.debug('Running node task in process', { rank, task: task.exportName });
            let raw: unknown;
            try {
                raw = await fn(structuredClone(payload), context);
            } catch (e) {
                throw new WorkerSessionError(
                    `Rank ${rank} failed: ${describeError(e)}`,
                    'WORKER_TASK_FAILED',
                    rank,
                    e,
                    isRecord(e) ? e.details : undefined
                );
            }
            results.push(parseOrFail(task, raw, rank));
        }
        return results;
    }
}

/* -------------------------------------------------------------------------- */
/* Worker threads                                                             */
/* -------------------------------------------------------------------------- */

const WORKER_CODE = `
    const { parentPort, workerData } = require("worker_threads");
    const state = new Int32Array(workerData.barrier);

    function barrier() {
        const gen = Atomics.load(state, 1);
        if (Atomics.add(state, 0, 1) + 1 === workerData.worldSize) {
            Atomics.store(state, 0, 0);
            Atomics.add(state, 1, 1);
            Atomics.notify(state, 1);
            return;
        }
        while (Atomics.load(state, 1) === gen) {
            Atomics.wait(state, 1, gen, 100);
        }
    }

    async function run() {
        try {
            const mod = require(workerData.modulePath);
            const fn = mod[workerData.exportName];
            if (typeof fn !== "function") {
                throw new Error("Node task export not found: " + workerData.exportName);
            }
            const context = { rank: workerData.rank, world_size: workerData.worldSize, barrier };
            const data = await fn(workerData.payload, context);
            parentPort.postMessage({ type: "result", data });
        } catch (err) {
            parentPort.postMessage({
                type: "error",
                name: String(err && err.name ? err.name : "Error"),
                message: String(err && err.message ? err.message : err),
                details: err && err.details !== undefined ? err.details : undefined,
            });
        }
    }

    run();
`;

type WorkerMessage =
    | { type: 'result'; data: unknown }
    | { type: 'error'; name: string; message: string; details: unknown };

function parseWorkerMessage(msg: unknown): WorkerMessage | null {
    if (!isRecord(msg)) return null;
    if (msg.type === 'result') return { type: 'result', data: msg.data };
    if (msg.type === 'error') {
        return { type: 'error', name: String(msg.name), message: String(msg.message), details: msg.details };
    }
    return null;
}

export interface ThreadWorkerSessionOptions {
    timeoutMs?: number;
    log?: Logger;
}

export class ThreadWorkerSession implements WorkerSession {
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(readonly worldSize: number, options: ThreadWorkerSessionOptions = {}) {
        checkWorldSize(worldSize);
        this.timeoutMs = options.timeoutMs ?? TIMEOUTS.WORKER_TIMEOUT_MS;
        this.log = options.log ?? defaultLog;
    }

    submitSync<P, R>(task: NodeTask<P, R>, payload: P): Promise<R[]> {
        const modulePath = path.resolve(task.modulePath);
        const barrier = new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT);
        const log = this.log;
        const timeoutMs = this.timeoutMs;
        const worldSize = this.worldSize;

        return new Promise<R[]>((resolve, reject) => {
            const workers: Worker[] = [];
            const results: R[] = new Array<R>(worldSize);
            let pending = worldSize;
            let settled = false;

            const terminateAll = (): Promise<void> =>
                Promise.all(workers.map((w) => w.terminate())).then(() => undefined);

            const fail = (err: WorkerSessionError): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                log.error(err.message, { rank: err.rank, code: err.code });
                terminateAll().then(
                    () => reject(err),
                    (termErr: unknown) => {
                        log.warn(`Failed to terminate workers: ${describeError(termErr)}`);
                        reject(err);
                    }
                );
            };

            const timer = setTimeout(() => {
                fail(new WorkerSessionError(
                    `Workers killed after ${timeoutMs}ms running ${task.exportName}`,
                    'WORKER_TIMEOUT',
                    -1
                ));
            }, timeoutMs);

            for (let rank = 0; rank < worldSize; rank++) {
                const worker = new Worker(WORKER_CODE, {
                    eval: true,
                    workerData: {
                        modulePath,
                        exportName: task.exportName,
                        payload,
                        rank,
                        worldSize,
                        barrier,
                    },
                });
                workers.push(worker);
                let answered = false;

                worker.on('message', (raw: unknown) => {
                    if (settled) return;
                    const msg = parseWorkerMessage(raw);
                    if (msg === null) return;
                    answered = true;

                    if (msg.type === 'error') {
                        fail(new WorkerSessionError(
                            `Rank ${rank} failed: ${msg.name}: ${msg.message}`,
                            'WORKER_TASK_FAILED',
                            rank,
                            undefined,
                            msg.details
                        ));
                        return;
                    }
                    try {
                        results[rank] = parseOrFail(task, msg.data, rank);
                    } catch (e) {
                        fail(e instanceof WorkerSessionError
                            ? e
                            : new WorkerSessionError(describeError(e), 'WORKER_TASK_FAILED', rank, e));
                        return;
                    }
                    pending -= 1;
                    if (pending === 0) {
                        settled = true;
                        clearTimeout(timer);
                        resolve(results);
                    }
                });

                worker.on('error', (err: Error) => {
                    fail(new WorkerSessionError(`Rank ${rank} crashed: ${err.message}`, 'WORKER_CRASHED', rank, err));
                });

                worker.on('exit', (code: number) => {
                    if (!answered) {
                        fail(new WorkerSessionError(
                            `Rank ${rank} exited with code ${code} before returning a result`,
                            'WORKER_CRASHED',
                            rank
                        ));
                    }
                });
            }
        });
    }
}
