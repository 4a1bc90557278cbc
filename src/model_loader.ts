/**
 * Model Loader — builds the engine for one rank.
 *
 * The steps follow the model format:
 *   hub model (not an engine)  → download first
 *   SOURCE_MODEL               → load source weights, build engine
 *   CHECKPOINT                 → load checkpoint, build engine
 *   ENGINE                     → nothing to do; the model directory is the engine
 */

import * as fs from 'fs';
import * as path from 'path';
import { BuildArgs, BuildArgsPayload } from './build_args';
import { BuildPipeline, BuildStats, BuildStep, BuildStepInfo, releaseResources } from './build_pipeline';
import { requiresCalibration } from './engine_config';
import { Logger, createLogger, setCorrelation } from './logger';
import { Engine, LoadedModel, Mapping, ModelBackend, ModelHub } from './model_types';
import { ModelInfo, loadCheckpointConfig } from './model_format';
import { BuildFailureDetails, InvalidOptionError } from './structured_error';
import { WorkerContext } from './worker_session';

const defaultLog = createLogger('model-loader');

export const QUANTIZED_CHECKPOINT_DIR = 'quantized-checkpoint';

export interface ModelLoaderOptions {
    /** Scratch directory for intermediate artifacts (quantized checkpoints). */
    workspace: string;
    stats?: BuildStats;
    hub?: ModelHub;
    /** Rank placement for multi-worker builds; single-rank when omitted. */
    context?: WorkerContext;
    log?: Logger;
}

const SINGLE_RANK: WorkerContext = { rank: 0, world_size: 1, barrier: () => undefined };

/** Copy `tokenizer*` entries of the model directory next to the engine. */
export function copyTokenizerFiles(modelDir: string, engineDir: string): string[] {
    const copied: string[] = [];
    for (const name of fs.readdirSync(modelDir)) {
        if (!name.startsWith('tokenizer')) continue;
        const src = fs.realpathSync(path.join(modelDir, name));
        const dst = path.join(engineDir, name);
        if (fs.statSync(src).isDirectory()) {
            fs.cpSync(src, dst, { recursive: true, force: true });
        } else {
            fs.copyFileSync(src, dst);
        }
        copied.push(name);
    }
    return copied;
}

export class ModelLoader {
    readonly stats: BuildStats;
    readonly mapping: Mapping;
    private readonly context: WorkerContext;
    private readonly hub: ModelHub | null;
    private readonly log: Logger;
    private readonly steps: BuildStep[] = [];

    private modelDir: string | null;
    private model: LoadedModel | null = null;
    private engine: Engine | null = null;
    private _modelInfo: ModelInfo | null = null;

    constructor(
        private readonly args: BuildArgs,
        private readonly backend: ModelBackend,
        private readonly options: ModelLoaderOptions
    ) {
        this.stats = options.stats ?? new BuildStats();
        this.context = options.context ?? SINGLE_RANK;
        this.hub = options.hub ?? null;
        this.log = options.log ?? defaultLog;
        this.modelDir = args.model_dir;

        const parallel = args.parallel;
        this.mapping = parallel.isMultiGpu && !parallel.auto_parallel
            ? { rank: this.context.rank, world_size: parallel.world_size, tp_size: parallel.tp_size, pp_size: parallel.pp_size }
            : { rank: 0, world_size: 1, tp_size: 1, pp_size: 1 };

        this.gatherBuildSteps();
    }

    get labels(): string[] {
        return this.steps.map((s) => s.label);
    }

    get modelInfo(): ModelInfo | null {
        return this._modelInfo;
    }

    private gatherBuildSteps(): void {
        const format = this.args.model_format;

        if (this.args.isHubModel && format !== 'ENGINE') {
            if (!this.hub) {
                throw new InvalidOptionError(`A model hub is required to download ${this.args.model}`);
            }
            this.steps.push({ label: 'Downloading model', run: () => this.downloadModel() });
        }

        switch (format) {
            case 'SOURCE_MODEL':
                this.steps.push({ label: 'Loading source model to memory', run: () => this.loadFromSource() });
                this.steps.push({ label: 'Building engine', run: () => this.buildEngine() });
                break;
            case 'CHECKPOINT':
                this.steps.push({ label: 'Loading checkpoint to memory', run: () => this.loadFromCheckpoint() });
                this.steps.push({ label: 'Building engine', run: () => this.buildEngine() });
                break;
            case 'ENGINE':
                break;
        }
    }

    /**
     * Run the steps and save the engine into `engineDir`. For engine inputs the
     * model directory is returned as is.
     */
    async load(engineDir?: string): Promise<string> {
        if (this.args.model_format === 'ENGINE') {
            return this.args.modelDir;
        }
        if (!engineDir) {
            throw new InvalidOptionError('An engine directory is required to save the built engine');
        }

        setCorrelation({ buildId: this.stats.build_id, rank: this.context.rank });
        const pipeline = new BuildPipeline(this.steps, this.stats, { rank: this.context.rank, log: this.log });
        await pipeline.run();

        await this.save(engineDir);
        this.stats.engine_dir = engineDir;
        return engineDir;
    }

    dispose(): void {
        this.model = null;
        this.engine = null;
        releaseResources();
    }

    /* ---------------------------------------------------------------------- */
    /* Steps                                                                  */
    /* ---------------------------------------------------------------------- */

    private requireModelDir(): string {
        if (this.modelDir === null) throw new Error('The model directory is not available yet.');
        return this.modelDir;
    }

    private async downloadModel(): Promise<void> {
        const hub = this.hub;
        if (!hub) throw new Error('No model hub configured');
        // Rank 0 downloads; the others reuse its download after the barrier.
        if (this.context.rank === 0) {
            this.modelDir = await hub.downloadModel(this.args.model, this.args.revision);
            this.log.info(`Downloaded model to ${this.modelDir}`);
        }
        this.context.barrier();
        if (this.context.rank !== 0) {
            this.modelDir = await hub.downloadModel(this.args.model, this.args.revision);
        }
        this.stats.model_from_hub = true;
        this.stats.local_model_dir = this.modelDir;
    }

    private async loadFromSource(): Promise<void> {
        const modelDir = this.requireModelDir();
        const args = this.args;

        if (args.load_format !== 'dummy' && requiresCalibration(args.quant_config)) {
            const quantize = this.backend.quantize;
            if (!quantize) {
                throw new Error(`Quantization ${args.quant_config.quant_algo} needs calibration, which the backend does not support`);
            }
            const checkpointDir = path.join(this.options.workspace, QUANTIZED_CHECKPOINT_DIR);
            if (this.context.rank === 0) {
                await quantize.call(this.backend, {
                    model_dir: modelDir,
                    output_dir: checkpointDir,
                    dtype: args.dtype,
                    mapping: this.mapping,
                    quant_config: args.quant_config,
                    calib_config: args.calib_config,
                    trust_remote_code: args.trust_remote_code,
                });
            }
            if (args.parallel.isMultiGpu) this.context.barrier();
            this.model = await this.backend.loadFromCheckpoint({
                checkpoint_dir: checkpointDir,
                mapping: this.mapping,
                dummy_weights: false,
            });
        } else {
            this.model = await this.backend.loadFromSource({
                model_dir: modelDir,
                dtype: args.dtype,
                mapping: this.mapping,
                quant_config: args.quant_config,
                trust_remote_code: args.trust_remote_code,
                convert_options: args.convert_checkpoint_options,
                dummy_weights: args.load_format === 'dummy',
            });
        }
        this._modelInfo = ModelInfo.fromPretrained(this.model);
    }

    private async loadFromCheckpoint(): Promise<void> {
        const checkpointDir = this.requireModelDir();
        const checkpoint = loadCheckpointConfig(checkpointDir);

        this.model = await this.backend.loadFromCheckpoint({
            checkpoint_dir: checkpointDir,
            mapping: this.mapping,
            dummy_weights: this.args.load_format === 'dummy',
        });
        this._modelInfo = ModelInfo.fromPretrained(this.model);

        // Embedding sharing follows the checkpoint.
        this.args.convert_checkpoint_options.share_embedding_table = checkpoint.share_embedding_table;
        this.args.convert_checkpoint_options.use_parallel_embedding = checkpoint.use_parallel_embedding;
    }

    private async buildEngine(): Promise<void> {
        const model = this.model;
        if (!model) throw new Error('The model is not loaded yet.');
        // The backend gets its own copy; the arbitrated config stays as resolved.
        this.engine = await this.backend.build(model, structuredClone(this.args.build_config));
        this.model = null;
    }

    private async save(engineDir: string): Promise<void> {
        const engine = this.engine;
        if (!engine) throw new Error('No engine was built.');
        fs.mkdirSync(engineDir, { recursive: true });
        await engine.save(engineDir);
        if (this.context.rank === 0 && this.modelDir !== null) {
            const copied = copyTokenizerFiles(this.modelDir, engineDir);
            if (copied.length > 0) this.log.debug('Copied tokenizer files', { files: copied });
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Multi-worker entry                                                         */
/* -------------------------------------------------------------------------- */

export type NodeBuildPayload = {
    args: BuildArgsPayload;
    workspace: string;
    engine_dir: string;
};

/**
 * Per-rank body of a multi-worker build. A node task module exports a
 * function that calls this with its own backend (and hub).
 */
export async function runNodeBuild(
    payload: NodeBuildPayload,
    context: WorkerContext,
    backend: ModelBackend,
    hub?: ModelHub
): Promise<BuildStepInfo[]> {
    const args = BuildArgs.fromNodePayload(payload.args);
    const loader = new ModelLoader(args, backend, { workspace: payload.workspace, hub, context });
    try {
        await loader.load(payload.engine_dir);
        return loader.stats.build_steps_info;
    } finally {
        loader.dispose();
    }
}

/** parseResult for node build tasks. */
export function parseBuildStepsInfo(raw: unknown): BuildStepInfo[] {
    if (!Array.isArray(raw)) throw new Error('expected an array of build step info');
    return raw.map((item: unknown, i) => {
        if (typeof item !== 'object' || item === null || !('label' in item) || !('latency_s' in item)) {
            throw new Error(`malformed build step info at ${i}`);
        }
        const { label, latency_s } = item;
        if (typeof label !== 'string' || typeof latency_s !== 'number') {
            throw new Error(`malformed build step info at ${i}`);
        }
        return { label, latency_s };
    });
}

/** Failure details a rank attached to its error; null when absent or malformed. */
export function parseBuildFailureDetails(raw: unknown): BuildFailureDetails | null {
    if (typeof raw !== 'object' || raw === null || !('failed_step' in raw) || !('build_steps_info' in raw)) {
        return null;
    }
    if (typeof raw.failed_step !== 'string') return null;
    try {
        return { failed_step: raw.failed_step, build_steps_info: parseBuildStepsInfo(raw.build_steps_info) };
    } catch {
        return null;
    }
}
