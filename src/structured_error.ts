/**
 * Structured Errors for configuration and build failures
 *
 * Every failure raised by enginekit is an EngineKitError carrying a
 * machine-readable code and context. toStructured() renders it together with
 * recovery options that a caller (or an operator) can act on.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Arbitration
    | 'CONFIG_CONFLICT'
    | 'INCONSISTENT_BASELINE'
    | 'INVALID_OPTION'
    | 'ARBITRATION_REUSE'
    | 'PERF_CLAIM_DROPPED'

    // Model input
    | 'FORMAT_INFERENCE_FAILED'

    // Build
    | 'BUILD_STEP_FAILED'
    | 'WORKER_CRASHED'
    | 'WORKER_TIMEOUT'
    | 'WORKER_TASK_FAILED'

    // Cache
    | 'CACHE_LOCK_HELD'
    | 'CACHE_IO_ERROR'
    | 'STORAGE_INSUFFICIENT';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'change_conflicting_option'
    | 'disable_feature'
    | 'fix_model_config'
    | 'retry_build'
    | 'clear_cache_slot'
    | 'free_disk_space'
    | 'raise_timeout'
    | 'abort_build';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
    estimated_success_probability: number; // 0.0-1.0
    side_effects?: string[];
    command?: string;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: [...recoveryOptions].sort(
            (a, b) => b.estimated_success_probability - a.estimated_success_probability
        ),
        human_intervention_required: recoveryOptions.length === 0 ||
            recoveryOptions.every(opt => opt.estimated_success_probability < 0.5),
        timestamp: new Date().toISOString()
    };
}

export function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'CONFIG_CONFLICT',
        'INCONSISTENT_BASELINE',
        'INVALID_OPTION',
        'FORMAT_INFERENCE_FAILED',
    ];

    const warningCodes: ErrorCode[] = [
        'PERF_CLAIM_DROPPED',
        'STORAGE_INSUFFICIENT',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    changeOption: (group: string, option: string): RecoveryOption => ({
        action: 'change_conflicting_option',
        description: `Set ${group}.${option} explicitly to a value every enabled feature accepts`,
        risk_level: 'LOW',
        estimated_success_probability: 0.6,
    }),

    disableFeature: (feature: string): RecoveryOption => ({
        action: 'disable_feature',
        description: `Disable '${feature}'`,
        risk_level: 'MEDIUM',
        estimated_success_probability: 0.9,
        side_effects: ['Feature unavailable at runtime'],
    }),

    fixModelConfig: (configPath: string): RecoveryOption => ({
        action: 'fix_model_config',
        description: `Repair or replace ${configPath}`,
        risk_level: 'LOW',
        estimated_success_probability: 0.4,
        command: `cat ${configPath}`,
    }),

    retryBuild: (): RecoveryOption => ({
        action: 'retry_build',
        description: 'Retry the build; the cache slot was left unpublished',
        risk_level: 'LOW',
        estimated_success_probability: 0.5,
        side_effects: ['Full rebuild'],
    }),

    clearCacheSlot: (slotDir: string): RecoveryOption => ({
        action: 'clear_cache_slot',
        description: `Remove the cache slot ${slotDir}`,
        risk_level: 'MEDIUM',
        estimated_success_probability: 0.7,
        command: `rm -rf ${slotDir}`,
        side_effects: ['Cached engine discarded'],
    }),

    freeDiskSpace: (root: string): RecoveryOption => ({
        action: 'free_disk_space',
        description: `Free space under ${root} or point the cache root elsewhere`,
        risk_level: 'LOW',
        estimated_success_probability: 0.8,
        command: `df -h ${root}`,
    }),

    raiseTimeout: (envVar: string): RecoveryOption => ({
        action: 'raise_timeout',
        description: `Increase ${envVar}`,
        risk_level: 'LOW',
        estimated_success_probability: 0.6,
    }),

    abortBuild: (reason: string): RecoveryOption => ({
        action: 'abort_build',
        description: `Abort build: ${reason}`,
        risk_level: 'HIGH',
        estimated_success_probability: 1.0,
        side_effects: ['Build terminated'],
    }),
};

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class EngineKitError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'EngineKitError';
    }

    get severity(): Severity {
        return getSeverity(this.code);
    }

    protected recoveryOptions(): RecoveryOption[] {
        return [];
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, this.context, this.recoveryOptions());
    }
}

/** Two functional claims (or a claim and a baseline) want different values for one option. */
export class ConfigConflictError extends EngineKitError {
    constructor(
        public readonly group: string,
        public readonly option: string,
        public readonly feature: string,
        public readonly value: unknown,
        public readonly existingSource: string,
        public readonly existingValue: unknown
    ) {
        super(
            `Cannot set '${option}' to be '${formatValue(value)}' when enabling '${feature}', ` +
            `since '${existingSource}' has set it to be '${formatValue(existingValue)}'.`,
            'CONFIG_CONFLICT',
            { group, option, feature, value, existing_source: existingSource, existing_value: existingValue }
        );
        this.name = 'ConfigConflictError';
    }

    protected recoveryOptions(): RecoveryOption[] {
        return [
            CommonRecoveryOptions.disableFeature(this.feature),
            CommonRecoveryOptions.disableFeature(this.existingSource),
        ];
    }
}

export class InconsistentBaselineError extends EngineKitError {
    constructor(
        public readonly group: string,
        public readonly option: string,
        public readonly info: string,
        public readonly value: unknown,
        public readonly existingSource: string,
        public readonly existingValue: unknown
    ) {
        super(
            `Baseline '${info}' sets '${group}.${option}' to '${formatValue(value)}', ` +
            `but '${existingSource}' already set it to '${formatValue(existingValue)}'.`,
            'INCONSISTENT_BASELINE',
            { group, option, info, value, existing_source: existingSource, existing_value: existingValue }
        );
        this.name = 'InconsistentBaselineError';
    }
}

export class InvalidOptionError extends EngineKitError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_OPTION', context);
        this.name = 'InvalidOptionError';
    }
}

export class ArbitrationReuseError extends EngineKitError {
    constructor() {
        super('ConfigArbitrator has already resolved; create a new instance per resolution', 'ARBITRATION_REUSE');
        this.name = 'ArbitrationReuseError';
    }
}

export class FormatInferenceError extends EngineKitError {
    constructor(message: string, public readonly configPath: string, cause?: unknown) {
        super(message, 'FORMAT_INFERENCE_FAILED', { config_path: configPath }, cause);
        this.name = 'FormatInferenceError';
    }

    protected recoveryOptions(): RecoveryOption[] {
        return [CommonRecoveryOptions.fixModelConfig(this.configPath)];
    }
}

/** What a failed build had done; travels with the error across worker ranks. */
export interface BuildFailureDetails {
    failed_step: string;
    build_steps_info: { label: string; latency_s: number }[];
}

export class BuildStepError extends EngineKitError {
    readonly details: BuildFailureDetails;

    constructor(
        public readonly step: string,
        public readonly stepIndex: number,
        cause: unknown,
        completedSteps: { label: string; latency_s: number }[] = []
    ) {
        super(
            `Build step [${stepIndex + 1}] '${step}' failed: ${describeError(cause)}`,
            'BUILD_STEP_FAILED',
            { step, step_index: stepIndex },
            cause
        );
        this.name = 'BuildStepError';
        this.details = { failed_step: step, build_steps_info: completedSteps.map((info) => ({ ...info })) };
    }

    protected recoveryOptions(): RecoveryOption[] {
        return [CommonRecoveryOptions.retryBuild(), CommonRecoveryOptions.abortBuild(this.step)];
    }
}

export type BuildCacheErrorCode = 'CACHE_LOCK_HELD' | 'CACHE_IO_ERROR';

export class BuildCacheError extends EngineKitError {
    constructor(message: string, code: BuildCacheErrorCode, context: Record<string, unknown> = {}, cause?: unknown) {
        super(message, code, context, cause);
        this.name = 'BuildCacheError';
    }

    protected recoveryOptions(): RecoveryOption[] {
        if (this.code === 'CACHE_LOCK_HELD') {
            return [CommonRecoveryOptions.raiseTimeout('ENGINEKIT_CACHE_LOCK_TIMEOUT')];
        }
        const slot = this.context.slot_dir;
        return typeof slot === 'string' ? [CommonRecoveryOptions.clearCacheSlot(slot)] : [];
    }
}

export type WorkerSessionErrorCode = 'WORKER_CRASHED' | 'WORKER_TIMEOUT' | 'WORKER_TASK_FAILED';

export class WorkerSessionError extends EngineKitError {
    constructor(
        message: string,
        code: WorkerSessionErrorCode,
        public readonly rank: number,
        cause?: unknown,
        /** `details` of the error the rank's task threw, if it had any. */
        public readonly details?: unknown
    ) {
        super(message, code, { rank }, cause);
        this.name = 'WorkerSessionError';
    }

    protected recoveryOptions(): RecoveryOption[] {
        return this.code === 'WORKER_TIMEOUT'
            ? [CommonRecoveryOptions.raiseTimeout('ENGINEKIT_WORKER_TIMEOUT')]
            : [CommonRecoveryOptions.retryBuild()];
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

function formatValue(v: unknown): string {
    if (typeof v === 'string') return v;
    if (v === undefined) return 'undefined';
    return JSON.stringify(v);
}
