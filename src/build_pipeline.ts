/**
 * Build Pipeline — runs the build steps of one rank in order.
 *
 * State machine: PENDING → RUNNING(i) → COMPLETE | FAILED(i). The first
 * throwing step stops the run; stats keep the latencies of the steps that
 * finished plus the label of the one that failed.
 */

import * as crypto from 'crypto';
import { performance } from 'perf_hooks';
import { Logger, createLogger, setCorrelation } from './logger';
import { BuildStepError, InvalidOptionError } from './structured_error';

const defaultLog = createLogger('build-pipeline');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface BuildStep {
    label: string;
    run: () => void | Promise<void>;
}

export type BuildStepInfo = { label: string; latency_s: number };

export type PipelineState =
    | { kind: 'PENDING' }
    | { kind: 'RUNNING'; step: number }
    | { kind: 'COMPLETE' }
    | { kind: 'FAILED'; step: number };

/** Statistics of one build attempt. Never persisted. */
export class BuildStats {
    readonly build_id: string = crypto.randomUUID();
    cache_hit = false;
    /** The engine of this attempt was published into the build cache. */
    cache_populated = false;
    cache_info: string | null = null;
    model_from_hub = false;
    local_model_dir: string | null = null;
    engine_dir: string | null = null;
    build_steps_info: BuildStepInfo[] = [];
    failed_step: string | null = null;
}

/** Drop what the runtime can reclaim between steps. Forces a GC when node runs with --expose-gc. */
export function releaseResources(): void {
    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc === 'function') gc();
}

export interface BuildPipelineOptions {
    /** Progress is logged on rank 0 only. */
    rank?: number;
    log?: Logger;
    release?: () => void;
}

/* -------------------------------------------------------------------------- */
/* Pipeline                                                                   */
/* -------------------------------------------------------------------------- */

export class BuildPipeline {
    private _state: PipelineState = { kind: 'PENDING' };
    private readonly toLog: boolean;
    private readonly log: Logger;
    private readonly release: () => void;

    constructor(
        private readonly steps: BuildStep[],
        readonly stats: BuildStats,
        options: BuildPipelineOptions = {}
    ) {
        this.toLog = (options.rank ?? 0) === 0;
        this.log = options.log ?? defaultLog;
        this.release = options.release ?? releaseResources;
    }

    get state(): PipelineState {
        return this._state;
    }

    get labels(): string[] {
        return this.steps.map((s) => s.label);
    }

    async run(): Promise<void> {
        if (this._state.kind !== 'PENDING') {
            throw new InvalidOptionError(`BuildPipeline already ran (state ${this._state.kind})`);
        }
        const started = performance.now();
        const n = this.steps.length;

        for (let i = 0; i < n; i++) {
            const step = this.steps[i];
            this._state = { kind: 'RUNNING', step: i };
            setCorrelation({ step: step.label });
            if (this.toLog) this.log.info(`Loading Model: [${i + 1}/${n}]\t${step.label}`);

            const stepStart = performance.now();
            try {
                await step.run();
            } catch (e) {
                this._state = { kind: 'FAILED', step: i };
                this.stats.failed_step = step.label;
                throw new BuildStepError(step.label, i, e, this.stats.build_steps_info);
            } finally {
                this.release();
                setCorrelation({ step: '' });
            }

            const latency = (performance.now() - stepStart) / 1000;
            if (this.toLog) this.log.info(`Time: ${latency.toFixed(3)}s`);
            this.stats.build_steps_info.push({ label: step.label, latency_s: latency });
        }

        this._state = { kind: 'COMPLETE' };
        if (this.toLog) {
            const total = (performance.now() - started) / 1000;
            this.log.info('Loading model done.');
            this.log.info(`Total latency: ${total.toFixed(3)}s`);
        }
    }
}
