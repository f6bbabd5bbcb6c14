/**
 * Migration Workflow Engine
 *
 * Runs extract -> transform -> generate -> deploy over one WorkflowState.
 * A stage that throws puts the run into `error` and the remaining stages are
 * skipped. Sessions opened during the run are released on every path, and
 * release problems never change the final status.
 */

import { v4 as uuidv4 } from 'uuid';
import { StackCodeGeneratorOptions } from './code_generator';
import { DEFAULT_SOURCE_REGION } from './config';
import { InvalidRunConfigError, toStructuredError } from './errors';
import { clearCorrelation, createLogger, runWithCorrelation, setCorrelation } from './logger';
import { MigrationCollaborators, RunSessions, defaultCollaborators } from './run_sessions';
import { STAGES, StageContext, markError } from './stages';
import { ToolchainDriver } from './toolchain_driver';
import { WorkflowState } from './types';

const log = createLogger('workflow');

export const SUPPORTED_PROVIDERS: readonly string[] = ['aliyun', 'alibaba', 'alibabacloud'];

const PROJECT_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/;

export interface MigrationRequest {
    sourceConfig: {
        provider?: string;
        resourceId?: string;
        region?: string;
    };
    targetProjectName: string;
    targetDirectory: string;
}

export interface MigrationWorkflowOptions {
    generator?: StackCodeGeneratorOptions;
}

export function createInitialState(req: MigrationRequest): WorkflowState {
    return {
        runId: uuidv4(),
        sourceConfig: {
            provider: req.sourceConfig.provider ?? 'aliyun',
            resourceId: req.sourceConfig.resourceId || undefined,
            region: req.sourceConfig.region || DEFAULT_SOURCE_REGION,
        },
        targetProjectName: req.targetProjectName,
        targetDirectory: req.targetDirectory,
        sourceData: null,
        transformedData: null,
        generatedCode: '',
        projectPath: '',
        deploymentResult: null,
        status: 'started',
        extractionDegraded: false,
    };
}

export function validateRunRequest(state: WorkflowState): InvalidRunConfigError | null {
    if (!SUPPORTED_PROVIDERS.includes(state.sourceConfig.provider.toLowerCase())) {
        return new InvalidRunConfigError(`Unsupported source provider: ${state.sourceConfig.provider}`, {
            provider: state.sourceConfig.provider,
        });
    }
    if (!PROJECT_NAME_PATTERN.test(state.targetProjectName)) {
        return new InvalidRunConfigError(
            `Invalid target project name '${state.targetProjectName}': must start with a letter and contain only letters, digits and '-'`,
            { target_project_name: state.targetProjectName }
        );
    }
    if (state.targetDirectory.trim() === '') {
        return new InvalidRunConfigError('Target directory must not be empty');
    }
    return null;
}

export class MigrationWorkflow {
    constructor(
        private readonly collaborators: MigrationCollaborators = defaultCollaborators(),
        private readonly options: MigrationWorkflowOptions = {}
    ) {}

    /** Each call runs under its own log correlation context. */
    runMigration(req: MigrationRequest): Promise<WorkflowState> {
        return runWithCorrelation(() => this.execute(req));
    }

    private async execute(req: MigrationRequest): Promise<WorkflowState> {
        const state = createInitialState(req);
        setCorrelation({ runId: state.runId, project: state.targetProjectName, stage: '' });
        log.info('Migration started', {
            provider: state.sourceConfig.provider,
            resource_id: state.sourceConfig.resourceId ?? null,
            region: state.sourceConfig.region,
            target_directory: state.targetDirectory,
        });

        const sessions = new RunSessions(this.collaborators);
        const ctx: StageContext = {
            sessions,
            toolchain: new ToolchainDriver(this.collaborators.runner),
            generator: this.options.generator,
        };

        try {
            const invalid = validateRunRequest(state);
            if (invalid) {
                markError(state, invalid);
                this.handleError(state, invalid);
                return state;
            }

            for (const stage of STAGES) {
                setCorrelation({ stage: stage.name });
                let failure: unknown = null;
                try {
                    await stage.run(state, ctx);
                } catch (e) {
                    failure = e;
                    markError(state, e);
                }
                if (state.status === 'error') {
                    this.handleError(state, failure ?? state.errorMessage);
                    break;
                }
                log.info('Stage complete', { stage: stage.name, status: state.status });
            }

            if (state.status === 'completed') {
                log.info('Migration completed', {
                    project_path: state.projectPath,
                    extraction_degraded: state.extractionDegraded,
                });
            }
            return state;
        } finally {
            setCorrelation({ stage: 'cleanup' });
            await sessions.releaseAll();
            clearCorrelation();
        }
    }

    private handleError(state: WorkflowState, cause: unknown): void {
        log.error('Migration failed', {
            ...toStructuredError(cause),
            status: state.status,
        });
    }
}
