/**
 * Main entry point - exports all public APIs
 */

export { MigrationWorkflow, createInitialState, validateRunRequest, SUPPORTED_PROVIDERS } from './workflow_engine';
export type { MigrationRequest, MigrationWorkflowOptions } from './workflow_engine';
export { RunSessions, defaultCollaborators } from './run_sessions';
export type { MigrationCollaborators } from './run_sessions';
export { STAGES, extractStage, transformStage, generateStage, deployStage, advance } from './stages';
export type { Stage, StageContext, StageTimeouts } from './stages';

export {
    normalizeProviderResponse,
    normalizeSubnetResponse,
    normalizeVpc,
    syntheticVpc,
    VPC_COLLECTION_STRATEGIES,
} from './provider_normalizer';
export { parseVpcText, parseSubnetText, extractJson } from './semantic_parser';
export { transformVpc, mapZone, toIdentifier } from './schema_transformer';
export {
    StackCodeGenerator,
    GenerationSession,
    buildStackDescription,
    extractStackCode,
    stackClassName,
} from './code_generator';
export type { GenerationPhase, GenerationResult, StackCodeGeneratorOptions } from './code_generator';
export { ToolchainDriver } from './toolchain_driver';
export { writeProjectFiles, renderEntryPoint, stackFilePath, entryPointFilePath } from './project_files';

export { AliyunCliProvider, decodeProviderPayload } from './provider_client';
export type { ProviderApiClient, ProviderPayload } from './provider_client';
export { BedrockModelClient, parseBedrockBody, responseText } from './model_client';
export type {
    ModelClient,
    ModelRequest,
    ModelResponse,
    ModelMessage,
    ContentBlock,
    TextBlock,
    ToolUseBlock,
    ToolResultBlock,
    ToolDescriptor,
} from './model_client';
export { CommandToolProvider, loadToolCatalogue, parseToolCatalogue } from './tool_provider';
export type { ToolProvider, ToolCallResult, ToolCatalogueEntry } from './tool_provider';
export { SpawnCommandRunner } from './command_runner';
export type { CommandRunner, CommandRequest, CommandResult } from './command_runner';

export { SchemaValidator } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export {
    MigrationError,
    ExtractionDegraded,
    TransformError,
    GenerationLoopExceeded,
    GenerationExtractionEmpty,
    ScaffoldError,
    DeployError,
    ModelCallError,
    ProviderCallError,
    TimeoutError,
    InvalidRunConfigError,
    toStructuredError,
} from './errors';
export type { MigrationErrorCode, StructuredError } from './errors';
export { createLogger, setCorrelation, clearCorrelation, getCorrelation, runWithCorrelation } from './logger';
export type { Correlation, Logger } from './logger';
export type * from './types';
