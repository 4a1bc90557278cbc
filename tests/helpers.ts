import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { BuildConfig } from '../src/engine_config';
import { Logger } from '../src/logger';
import {
    CheckpointLoadRequest,
    Engine,
    LoadedModel,
    ModelBackend,
    ModelHub,
    QuantizeRequest,
    SourceLoadRequest,
} from '../src/model_types';

export type LogLine = { level: 'debug' | 'info' | 'warn' | 'error'; msg: string };

/** Logger that keeps every line in memory. */
export function recordingLogger(lines: LogLine[] = []): Logger & { lines: LogLine[] } {
    const log: Logger & { lines: LogLine[] } = {
        lines,
        debug: (msg) => { lines.push({ level: 'debug', msg }); },
        info: (msg) => { lines.push({ level: 'info', msg }); },
        warn: (msg) => { lines.push({ level: 'warn', msg }); },
        error: (msg) => { lines.push({ level: 'error', msg }); },
        child: () => log,
    };
    return log;
}

export function tmpDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function writeJson(file: string, data: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(data, null, 2));
}

/** A source model directory: config.json, a weights file and a tokenizer. */
export function makeSourceModel(dir: string, config: Record<string, unknown> = {}): string {
    writeJson(path.join(dir, 'config.json'), {
        architectures: ['TinyForCausalLM'],
        torch_dtype: 'bfloat16',
        vocab_size: 1000,
        hidden_size: 64,
        num_hidden_layers: 2,
        num_attention_heads: 4,
        ...config,
    });
    fs.writeFileSync(path.join(dir, 'model.safetensors'), 'weights');
    fs.writeFileSync(path.join(dir, 'tokenizer.json'), '{"vocab":{}}');
    return dir;
}

export function makeCheckpoint(dir: string, mapping = { world_size: 1, tp_size: 1, pp_size: 1 }): string {
    writeJson(path.join(dir, 'config.json'), {
        architecture: 'TinyForCausalLM',
        dtype: 'float16',
        mapping,
        share_embedding_table: true,
        use_parallel_embedding: true,
    });
    return dir;
}

export function makeEngineDir(dir: string, buildConfig: Record<string, unknown>, mapping = { world_size: 1, tp_size: 1, pp_size: 1 }): string {
    writeJson(path.join(dir, 'config.json'), {
        version: '0.4.0',
        pretrained_config: { architecture: 'TinyForCausalLM', dtype: 'float16', mapping },
        build_config: buildConfig,
    });
    return dir;
}

export type BackendCall =
    | { kind: 'source'; req: SourceLoadRequest }
    | { kind: 'checkpoint'; req: CheckpointLoadRequest }
    | { kind: 'quantize'; req: QuantizeRequest }
    | { kind: 'build'; buildConfig: BuildConfig };

/** Backend whose engine is a single `rank0.engine` file per rank. */
export class FakeBackend implements ModelBackend {
    readonly calls: BackendCall[] = [];
    failOn: BackendCall['kind'] | null = null;
    /** When set, `build` waits for it before returning. */
    buildGate: Promise<void> | null = null;

    constructor(private readonly rank = 0) { }

    private check(kind: BackendCall['kind']): void {
        if (this.failOn === kind) throw new Error(`${kind} exploded`);
    }

    async loadFromSource(req: SourceLoadRequest): Promise<LoadedModel> {
        this.calls.push({ kind: 'source', req });
        this.check('source');
        return { architecture: 'TinyForCausalLM', dtype: req.dtype };
    }

    async loadFromCheckpoint(req: CheckpointLoadRequest): Promise<LoadedModel> {
        this.calls.push({ kind: 'checkpoint', req });
        this.check('checkpoint');
        return { architecture: 'TinyForCausalLM', dtype: 'float16' };
    }

    async quantize(req: QuantizeRequest): Promise<void> {
        this.calls.push({ kind: 'quantize', req });
        this.check('quantize');
        fs.mkdirSync(req.output_dir, { recursive: true });
    }

    async build(_model: LoadedModel, buildConfig: BuildConfig): Promise<Engine> {
        this.calls.push({ kind: 'build', buildConfig });
        if (this.buildGate) await this.buildGate;
        this.check('build');
        const rank = this.rank;
        return {
            save(dir: string): void {
                fs.writeFileSync(path.join(dir, `rank${rank}.engine`), 'engine');
            },
        };
    }

    count(kind: BackendCall['kind']): number {
        return this.calls.filter((c) => c.kind === kind).length;
    }
}

/** Hub that serves one prepared source model directory. */
export class FakeHub implements ModelHub {
    downloads = 0;
    configDownloads = 0;

    constructor(private readonly modelDir: string) { }

    async downloadModel(): Promise<string> {
        this.downloads += 1;
        return this.modelDir;
    }

    async downloadPretrainedConfig(): Promise<string> {
        this.configDownloads += 1;
        return this.modelDir;
    }
}
