import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { BuildArgs, ParallelConfig } from '../src/build_args';
import { BUILD_DEFAULTS } from '../src/config';
import { defaultBuildConfig, defaultKvCacheConfig, defaultQuantConfig } from '../src/engine_config';
import { ConfigConflictError, InvalidOptionError } from '../src/structured_error';
import { makeCheckpoint, makeEngineDir, makeSourceModel, recordingLogger, tmpDir } from './helpers';

const AMPERE = { sm_major: 8, sm_minor: 0 };
const TURING = { sm_major: 7, sm_minor: 5 };

function withModel(fn: (dir: string) => void): void {
    const dir = tmpDir('build-args');
    try {
        fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

test('local source model gets defaults settled', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs({ model: dir, build_config: defaultBuildConfig({ max_num_tokens: null }) }, recordingLogger());
        args.setup(AMPERE);

        assert.equal(args.isLocalModel, true);
        assert.equal(args.modelDir, path.resolve(dir));
        assert.equal(args.model_format, 'SOURCE_MODEL');
        assert.equal(args.build_config.max_num_tokens, BUILD_DEFAULTS.MAX_NUM_TOKENS);
        assert.equal(args.build_config.plugin_config.nccl_plugin, null);
        assert.deepEqual(args.convert_checkpoint_options, {
            use_parallel_embedding: true,
            embedding_sharding_dim: 0,
            share_embedding_table: false,
        });
        assert.equal(args.dtype, 'auto');
    });
});

test('an unknown path is treated as a hub model id', () => {
    const args = new BuildArgs({ model: 'acme/tiny-model-does-not-exist' }, recordingLogger());
    args.setup(AMPERE);

    assert.equal(args.isHubModel, true);
    assert.equal(args.model_format, 'SOURCE_MODEL');
    assert.throws(() => args.modelDir, InvalidOptionError);
});

test('chunked context yields to FP8 quantization', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const log = recordingLogger();
        const args = new BuildArgs(
            { model: dir, enable_chunked_context: true, quant_config: defaultQuantConfig({ quant_algo: 'FP8' }) },
            log
        );
        args.setup(AMPERE);

        assert.equal(args.build_config.plugin_config.use_paged_context_fmha, false);
        assert.equal(args.enable_chunked_context, false);
        assert.deepEqual(args.dropped_claims.map((d) => d.perf), ['chunked_context']);
        assert.deepEqual(
            log.lines.filter((l) => l.level === 'warn').map((l) => l.msg),
            [
                "Ignoring performance claim 'chunked_context' for option 'use_paged_context_fmha' due to conflict.",
                'Disabling chunked context due to configuration conflict.',
            ]
        );
    });
});

test('chunked context turns on paged context attention when nothing objects', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs({ model: dir, enable_chunked_context: true }, recordingLogger());
        args.setup(AMPERE);

        assert.equal(args.build_config.plugin_config.use_paged_context_fmha, true);
        assert.equal(args.enable_chunked_context, true);
        assert.equal(args.resolved?.plugin.use_paged_context_fmha, true);
    });
});

test('arbitration can be switched off', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs(
            { model: dir, enable_chunked_context: true, arbitrate_config: false },
            recordingLogger()
        );
        args.setup(AMPERE);

        assert.equal(args.build_config.plugin_config.use_paged_context_fmha, false);
        assert.equal(args.enable_chunked_context, true);
        assert.equal(args.resolved, null);
    });
});

test('pre-Ampere hardware forces float16 and rejects bfloat16', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs({ model: dir }, recordingLogger());
        args.setup(TURING);
        assert.equal(args.dtype, 'float16');

        const bf16 = new BuildArgs({ model: dir, dtype: 'bfloat16' }, recordingLogger());
        assert.throws(() => bf16.setup(TURING), { message: 'Pre SM 80 GPUs do not support bfloat16' });
    });
});

test('block reuse cannot be enabled on pre-Ampere hardware', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs(
            { model: dir, kv_cache_config: defaultKvCacheConfig({ enable_block_reuse: true }) },
            recordingLogger()
        );
        assert.throws(
            () => args.setup(TURING),
            (err: unknown) => err instanceof ConfigConflictError &&
                err.message === "Cannot set 'enable_block_reuse' to be 'true' when enabling 'enable_block_reuse', " +
                "since 'pre-ampere not supported' has set it to be 'false'."
        );
    });
});

test('block reuse conflicts with beam search', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs(
            {
                model: dir,
                build_config: defaultBuildConfig({ max_beam_width: 4 }),
                kv_cache_config: defaultKvCacheConfig({ enable_block_reuse: true }),
            },
            recordingLogger()
        );
        assert.throws(
            () => args.setup(AMPERE),
            {
                name: 'ConfigConflictError',
                message: "Cannot set 'enable_block_reuse' to be 'true' when enabling 'enable_block_reuse', " +
                    "since 'beam_search (beam_width > 1)' has set it to be 'false'.",
            }
        );
    });
});

test('block reuse enables paged context attention', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs(
            { model: dir, kv_cache_config: defaultKvCacheConfig({ enable_block_reuse: true }) },
            recordingLogger()
        );
        args.setup(AMPERE);

        assert.equal(args.kv_cache_config.enable_block_reuse, true);
        assert.equal(args.build_config.plugin_config.use_paged_context_fmha, true);
    });
});

test('streaming LLM needs an attention window and sink tokens', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const streaming = defaultBuildConfig({ plugin_config: { streamingllm: true } });

        const missing = new BuildArgs({ model: dir, build_config: streaming }, recordingLogger());
        assert.throws(() => missing.setup(AMPERE), {
            message: 'KvCacheConfig.max_attention_window should be set for streaming LLM.',
        });

        const zeroSink = new BuildArgs(
            {
                model: dir,
                build_config: streaming,
                kv_cache_config: defaultKvCacheConfig({ max_attention_window: [64], sink_token_length: 0 }),
            },
            recordingLogger()
        );
        assert.throws(() => zeroSink.setup(AMPERE), {
            message: 'KvCacheConfig.sink_token_length should be greater than 0.',
        });

        const ok = new BuildArgs(
            {
                model: dir,
                build_config: streaming,
                kv_cache_config: defaultKvCacheConfig({ max_attention_window: [64], sink_token_length: 4 }),
            },
            recordingLogger()
        );
        ok.setup(AMPERE);
        assert.equal(ok.kv_cache_config.enable_block_reuse, false);
        assert.equal(ok.build_config.plugin_config.use_paged_context_fmha, false);
    });
});

test('engine inputs keep their build config and reject conflicting runtime options', () => {
    withModel((dir) => {
        makeEngineDir(dir, { max_batch_size: 8, max_num_tokens: 512, plugin_config: { use_paged_context_fmha: false } });
        const log = recordingLogger();
        const args = new BuildArgs({ model: dir, build_config: defaultBuildConfig() }, log);
        args.setup(AMPERE);

        assert.equal(args.model_format, 'ENGINE');
        assert.equal(args.buildConfigMutable, false);
        assert.equal(args.build_config.max_batch_size, 8);
        assert.equal(args.build_config.max_num_tokens, 512);
        assert.equal(args.engine_pretrained_config?.architecture, 'TinyForCausalLM');
        assert.ok(log.lines.some((l) => l.msg === 'The build_config is ignored for model format of ENGINE.'));

        const reuse = new BuildArgs(
            { model: dir, kv_cache_config: defaultKvCacheConfig({ enable_block_reuse: true }) },
            recordingLogger()
        );
        assert.throws(() => reuse.setup(AMPERE), {
            name: 'ConfigConflictError',
            message: "Cannot set 'use_paged_context_fmha' to be 'true' when enabling 'enable_block_reuse', " +
                "since 'PluginConfig is readonly' has set it to be 'false'.",
        });
    });
});

test('engine parallel sizes must match explicit ones', () => {
    withModel((dir) => {
        makeEngineDir(dir, { max_batch_size: 8 }, { world_size: 4, tp_size: 4, pp_size: 1 });
        const args = new BuildArgs({ model: dir, tensor_parallel_size: 2 }, recordingLogger());
        assert.throws(() => args.setup(AMPERE), {
            message: "tp_size 2 is not consistent with the engine's tp_size 4",
        });

        const matching = new BuildArgs({ model: dir }, recordingLogger());
        matching.setup(AMPERE);
        assert.equal(matching.parallel.tp_size, 4);
        assert.equal(matching.parallel.world_size, 4);
    });
});

test('checkpoint inputs take parallel sizes from the checkpoint', () => {
    withModel((dir) => {
        makeCheckpoint(dir, { world_size: 2, tp_size: 2, pp_size: 1 });
        const args = new BuildArgs({ model: dir }, recordingLogger());
        args.setup(AMPERE);

        assert.equal(args.model_format, 'CHECKPOINT');
        assert.equal(args.parallel.world_size, 2);
        assert.equal(args.parallel.isMultiGpu, true);
        assert.equal(args.build_config.plugin_config.nccl_plugin, 'auto');
    });
});

test('LoRA, prompt adapter and fast build adjust the build config', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs(
            {
                model: dir,
                enable_lora: true,
                max_lora_rank: 16,
                enable_prompt_adapter: true,
                max_prompt_adapter_token: 10,
                fast_build: true,
                build_config: defaultBuildConfig({ max_batch_size: 4 }),
            },
            recordingLogger()
        );
        args.setup(AMPERE);

        assert.equal(args.build_config.plugin_config.lora_plugin, 'auto');
        assert.equal(args.build_config.lora_config.max_lora_rank, 16);
        assert.equal(args.build_config.max_prompt_embedding_table_size, 40);
        assert.equal(args.build_config.plugin_config.manage_weights, true);
    });
});

test('setup runs once and a missing model is rejected', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs({ model: dir }, recordingLogger());
        args.setup(AMPERE);
        assert.throws(() => args.setup(AMPERE), { message: 'BuildArgs.setup() has already run' });
    });
    assert.throws(() => new BuildArgs({ model: '' }, recordingLogger()).setup(AMPERE), {
        message: 'model should be provided.',
    });
});

test('explicit build cache configs are validated', () => {
    const args = new BuildArgs(
        { model: 'acme/tiny', enable_build_cache: { cache_root: '/tmp/cache', max_records: 0, max_cache_storage_gb: 1 } },
        recordingLogger()
    );
    assert.throws(() => args.setup(AMPERE), { message: 'Invalid build cache config: max_records 0' });
});

test('node payloads carry the settled arguments', () => {
    withModel((dir) => {
        makeSourceModel(dir);
        const args = new BuildArgs({ model: dir, enable_chunked_context: true, dtype: 'float16' }, recordingLogger());
        assert.throws(() => args.toNodePayload(), InvalidOptionError);
        args.setup(AMPERE);

        const copy = BuildArgs.fromNodePayload(args.toNodePayload(), recordingLogger());
        assert.equal(copy.model_dir, args.model_dir);
        assert.equal(copy.model_format, 'SOURCE_MODEL');
        assert.equal(copy.dtype, 'float16');
        assert.deepEqual(copy.build_config, args.build_config);
        assert.deepEqual(copy.parallel.toData(), args.parallel.toData());
        assert.throws(() => copy.setup(AMPERE), { message: 'BuildArgs.setup() has already run' });
    });
});

test('parallel config enforces world size and device rules', () => {
    const p = new ParallelConfig(2, 2);
    assert.equal(p.world_size, 4);
    assert.deepEqual(p.devices, [0, 1, 2, 3]);
    assert.throws(() => { p.world_size = 3; }, {
        message: 'world_size 3 should be equal to tp_size * pp_size 4 in non-auto_parallel mode.',
    });
    assert.throws(() => { p.devices = [0, 1]; }, InvalidOptionError);

    const auto = new ParallelConfig(1, 1, true);
    auto.world_size = 8;
    assert.equal(auto.world_size, 8);
    assert.equal(auto.isMultiGpu, true);

    assert.throws(() => new ParallelConfig(0, 1), { message: 'tp_size must be a positive integer, got 0' });
});
