import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { BuildArgs } from '../src/build_args';
import { BuildStats } from '../src/build_pipeline';
import { defaultQuantConfig } from '../src/engine_config';
import {
    ModelLoader,
    QUANTIZED_CHECKPOINT_DIR,
    copyTokenizerFiles,
    parseBuildFailureDetails,
    parseBuildStepsInfo,
} from '../src/model_loader';
import { BuildStepError, InvalidOptionError, WorkerSessionError } from '../src/structured_error';
import { InProcessWorkerSession } from '../src/worker_session';
import {
    FakeBackend,
    FakeHub,
    makeCheckpoint,
    makeEngineDir,
    makeSourceModel,
    recordingLogger,
    tmpDir,
} from './helpers';

const AMPERE = { sm_major: 8, sm_minor: 0 };
const NODE_TASK_MODULE = path.join(__dirname, 'fixtures', 'node_build_task.ts');

async function withDirs(fn: (root: string) => Promise<void>): Promise<void> {
    const root = tmpDir('model-loader');
    try {
        await fn(root);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
}

test('source models are loaded, built and saved with their tokenizer', async () => {
    await withDirs(async (root) => {
        const modelDir = makeSourceModel(path.join(root, 'model'));
        const args = new BuildArgs({ model: modelDir }, recordingLogger()).setup(AMPERE);
        const backend = new FakeBackend();
        const stats = new BuildStats();
        const loader = new ModelLoader(args, backend, { workspace: root, stats, log: recordingLogger() });

        assert.deepEqual(loader.labels, ['Loading source model to memory', 'Building engine']);
        const engineDir = path.join(root, 'engine');
        assert.equal(await loader.load(engineDir), engineDir);

        assert.deepEqual(fs.readdirSync(engineDir).sort(), ['rank0.engine', 'tokenizer.json']);
        assert.equal(stats.engine_dir, engineDir);
        assert.deepEqual(stats.build_steps_info.map((s) => s.label), loader.labels);
        assert.equal(loader.modelInfo?.modelName, 'TinyForCausalLM');

        const [source, build] = backend.calls;
        assert.ok(source.kind === 'source');
        assert.equal(source.req.model_dir, path.resolve(modelDir));
        assert.equal(source.req.dummy_weights, false);
        assert.deepEqual(source.req.mapping, { rank: 0, world_size: 1, tp_size: 1, pp_size: 1 });
        assert.ok(build.kind === 'build');
        assert.deepEqual(build.buildConfig, args.build_config);
        assert.notEqual(build.buildConfig, args.build_config);
        loader.dispose();
    });
});

test('dummy weights skip calibration', async () => {
    await withDirs(async (root) => {
        const modelDir = makeSourceModel(path.join(root, 'model'));
        const args = new BuildArgs(
            { model: modelDir, load_format: 'dummy', quant_config: defaultQuantConfig({ quant_algo: 'FP8' }) },
            recordingLogger()
        ).setup(AMPERE);
        const backend = new FakeBackend();
        await new ModelLoader(args, backend, { workspace: root, log: recordingLogger() }).load(path.join(root, 'engine'));

        assert.equal(backend.count('quantize'), 0);
        const [source] = backend.calls;
        assert.ok(source.kind === 'source');
        assert.equal(source.req.dummy_weights, true);
    });
});

test('calibrated quantization goes through a quantized checkpoint', async () => {
    await withDirs(async (root) => {
        const modelDir = makeSourceModel(path.join(root, 'model'));
        const args = new BuildArgs(
            { model: modelDir, quant_config: defaultQuantConfig({ quant_algo: 'W4A16_AWQ' }) },
            recordingLogger()
        ).setup(AMPERE);
        const backend = new FakeBackend();
        const workspace = path.join(root, 'workspace');
        await new ModelLoader(args, backend, { workspace, log: recordingLogger() }).load(path.join(root, 'engine'));

        assert.deepEqual(backend.calls.map((c) => c.kind), ['quantize', 'checkpoint', 'build']);
        const [quantize, checkpoint] = backend.calls;
        assert.ok(quantize.kind === 'quantize' && checkpoint.kind === 'checkpoint');
        assert.equal(quantize.req.output_dir, path.join(workspace, QUANTIZED_CHECKPOINT_DIR));
        assert.equal(quantize.req.quant_config.quant_algo, 'W4A16_AWQ');
        assert.equal(checkpoint.req.checkpoint_dir, path.join(workspace, QUANTIZED_CHECKPOINT_DIR));
    });
});

test('checkpoints are loaded and their embedding settings adopted', async () => {
    await withDirs(async (root) => {
        const ckpt = makeCheckpoint(path.join(root, 'ckpt'));
        const args = new BuildArgs({ model: ckpt, embedding_parallel_mode: 'NONE' }, recordingLogger()).setup(AMPERE);
        assert.equal(args.convert_checkpoint_options.use_parallel_embedding, false);

        const backend = new FakeBackend();
        const loader = new ModelLoader(args, backend, { workspace: root, log: recordingLogger() });
        assert.deepEqual(loader.labels, ['Loading checkpoint to memory', 'Building engine']);
        await loader.load(path.join(root, 'engine'));

        assert.equal(args.convert_checkpoint_options.use_parallel_embedding, true);
        assert.equal(args.convert_checkpoint_options.share_embedding_table, true);
        assert.deepEqual(fs.readdirSync(path.join(root, 'engine')), ['rank0.engine']);
    });
});

test('engine inputs need no steps', async () => {
    await withDirs(async (root) => {
        const engine = makeEngineDir(path.join(root, 'engine'), { max_batch_size: 8 });
        const args = new BuildArgs({ model: engine }, recordingLogger()).setup(AMPERE);
        const backend = new FakeBackend();
        const loader = new ModelLoader(args, backend, { workspace: root, log: recordingLogger() });

        assert.deepEqual(loader.labels, []);
        assert.equal(await loader.load(), path.resolve(engine));
        assert.deepEqual(backend.calls, []);
    });
});

test('hub models are downloaded first', async () => {
    await withDirs(async (root) => {
        const modelDir = makeSourceModel(path.join(root, 'hub-model'));
        const args = new BuildArgs({ model: 'acme/tiny' }, recordingLogger()).setup(AMPERE);
        const hub = new FakeHub(modelDir);
        const stats = new BuildStats();
        const loader = new ModelLoader(args, new FakeBackend(), { workspace: root, stats, hub, log: recordingLogger() });

        assert.deepEqual(loader.labels, ['Downloading model', 'Loading source model to memory', 'Building engine']);
        await loader.load(path.join(root, 'engine'));
        assert.equal(hub.downloads, 1);
        assert.equal(stats.model_from_hub, true);
        assert.equal(stats.local_model_dir, modelDir);
        assert.ok(fs.existsSync(path.join(root, 'engine', 'tokenizer.json')));

        assert.throws(
            () => new ModelLoader(args, new FakeBackend(), { workspace: root, log: recordingLogger() }),
            { message: 'A model hub is required to download acme/tiny' }
        );
    });
});

test('a failing build step is reported and nothing is saved', async () => {
    await withDirs(async (root) => {
        const modelDir = makeSourceModel(path.join(root, 'model'));
        const args = new BuildArgs({ model: modelDir }, recordingLogger()).setup(AMPERE);
        const backend = new FakeBackend();
        backend.failOn = 'build';
        const stats = new BuildStats();
        const loader = new ModelLoader(args, backend, { workspace: root, stats, log: recordingLogger() });
        const engineDir = path.join(root, 'engine');

        await assert.rejects(loader.load(engineDir), (err: unknown) =>
            err instanceof BuildStepError && err.message === "Build step [2] 'Building engine' failed: build exploded");
        assert.equal(stats.failed_step, 'Building engine');
        assert.deepEqual(stats.build_steps_info.map((s) => s.label), ['Loading source model to memory']);
        assert.equal(fs.existsSync(engineDir), false);

        await assert.rejects(
            new ModelLoader(args, new FakeBackend(), { workspace: root, log: recordingLogger() }).load(),
            InvalidOptionError
        );
    });
});

test('node builds run every rank into one engine directory', async () => {
    await withDirs(async (root) => {
        const ckpt = makeCheckpoint(path.join(root, 'ckpt'), { world_size: 2, tp_size: 2, pp_size: 1 });
        const args = new BuildArgs({ model: ckpt }, recordingLogger()).setup(AMPERE);
        const engineDir = path.join(root, 'engine');
        const session = new InProcessWorkerSession(2, recordingLogger());

        const results = await session.submitSync(
            { modulePath: NODE_TASK_MODULE, exportName: 'buildOnRank', parseResult: parseBuildStepsInfo },
            { args: args.toNodePayload(), workspace: root, engine_dir: engineDir }
        );

        assert.equal(results.length, 2);
        for (const infos of results) {
            assert.deepEqual(infos.map((s) => s.label), ['Loading checkpoint to memory', 'Building engine']);
        }
        assert.deepEqual(fs.readdirSync(engineDir).sort(), ['rank0.engine', 'rank1.engine']);
    });
});

test('a failing rank fails the node build', async () => {
    await withDirs(async (root) => {
        const ckpt = makeCheckpoint(path.join(root, 'ckpt'), { world_size: 2, tp_size: 2, pp_size: 1 });
        const args = new BuildArgs({ model: ckpt }, recordingLogger()).setup(AMPERE);
        const session = new InProcessWorkerSession(2, recordingLogger());

        await assert.rejects(
            session.submitSync(
                { modulePath: NODE_TASK_MODULE, exportName: 'failOnRank', parseResult: parseBuildStepsInfo },
                { args: args.toNodePayload(), workspace: root, engine_dir: path.join(root, 'engine') }
            ),
            (err: unknown) => {
                assert.ok(err instanceof WorkerSessionError);
                assert.equal(err.rank, 1);
                assert.equal(err.message, "Rank 1 failed: Build step [2] 'Building engine' failed: build exploded");
                const details = parseBuildFailureDetails(err.details);
                assert.equal(details?.failed_step, 'Building engine');
                assert.deepEqual(details?.build_steps_info.map((s) => s.label), ['Loading checkpoint to memory']);
                return true;
            }
        );
    });
});

test('tokenizer files and directories are copied through symlinks', () => {
    const root = tmpDir('tokenizer');
    try {
        const model = path.join(root, 'model');
        const engine = path.join(root, 'engine');
        fs.mkdirSync(path.join(model, 'tokenizer_assets'), { recursive: true });
        fs.mkdirSync(engine);
        fs.writeFileSync(path.join(model, 'tokenizer_assets', 'merges.txt'), 'a b');
        fs.writeFileSync(path.join(root, 'shared_tokenizer.json'), '{}');
        fs.symlinkSync(path.join(root, 'shared_tokenizer.json'), path.join(model, 'tokenizer.json'));
        fs.writeFileSync(path.join(model, 'weights.bin'), 'w');

        assert.deepEqual(copyTokenizerFiles(model, engine).sort(), ['tokenizer.json', 'tokenizer_assets']);
        assert.equal(fs.lstatSync(path.join(engine, 'tokenizer.json')).isSymbolicLink(), false);
        assert.equal(fs.readFileSync(path.join(engine, 'tokenizer_assets', 'merges.txt'), 'utf8'), 'a b');
        assert.equal(fs.existsSync(path.join(engine, 'weights.bin')), false);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('node build results are validated', () => {
    assert.deepEqual(parseBuildStepsInfo([{ label: 'Building engine', latency_s: 1.5 }]), [
        { label: 'Building engine', latency_s: 1.5 },
    ]);
    assert.throws(() => parseBuildStepsInfo([{ label: 'x' }]), { message: 'malformed build step info at 0' });
    assert.throws(() => parseBuildStepsInfo('nope'), { message: 'expected an array of build step info' });
});

test('build failure details are validated', () => {
    assert.deepEqual(parseBuildFailureDetails({ failed_step: 'Building engine', build_steps_info: [] }), {
        failed_step: 'Building engine',
        build_steps_info: [],
    });
    assert.equal(parseBuildFailureDetails({ failed_step: 3, build_steps_info: [] }), null);
    assert.equal(parseBuildFailureDetails({ failed_step: 'x', build_steps_info: [{ label: 'y' }] }), null);
    assert.equal(parseBuildFailureDetails(undefined), null);
});
