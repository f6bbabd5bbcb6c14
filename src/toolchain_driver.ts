/**
 * Toolchain Driver - CDK scaffold and deploy as subprocesses
 *
 * Only two exits are fatal: `cdk init` (ScaffoldError) and `cdk deploy`
 * (DeployError). Install and bootstrap run best effort, since bootstrap is
 * a no-op on repeat runs and install failures surface again at deploy.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TIMEOUTS, TOOLCHAIN } from './config';
import { CommandResult, CommandRunner } from './command_runner';
import { DeployError, ScaffoldError } from './errors';
import { createLogger } from './logger';
import { ProjectFilesWritten, writeProjectFiles } from './project_files';
import { DeploymentResult } from './types';

const log = createLogger('toolchain');

export interface ToolchainDriverConfig {
    cdkBin?: string;
    npmBin?: string;
}

export class ToolchainDriver {
    private readonly cdkBin: string;
    private readonly npmBin: string;

    constructor(private readonly runner: CommandRunner, config: ToolchainDriverConfig = {}) {
        this.cdkBin = config.cdkBin ?? TOOLCHAIN.CDK_BIN;
        this.npmBin = config.npmBin ?? TOOLCHAIN.NPM_BIN;
    }

    /** `cdk init app --language typescript`, skipped when cdk.json is already present. */
    async scaffold(projectPath: string): Promise<void> {
        fs.mkdirSync(projectPath, { recursive: true });

        if (fs.existsSync(path.join(projectPath, 'cdk.json'))) {
            log.info('Project already scaffolded, skipping cdk init', { project_path: projectPath });
            return;
        }

        log.info('Scaffolding CDK project', { project_path: projectPath });
        const res = await this.runner.run({
            command: this.cdkBin,
            args: ['init', 'app', '--language', 'typescript'],
            cwd: projectPath,
            timeoutMs: TIMEOUTS.SCAFFOLD_MS,
        });
        if (res.exitCode !== 0) {
            throw new ScaffoldError(res.exitCode, res.stderr);
        }
    }

    writeProjectFiles(projectPath: string, projectName: string, code: string): ProjectFilesWritten {
        return writeProjectFiles(projectPath, projectName, code);
    }

    /** install -> bootstrap -> deploy. Never touches project files. */
    async deploy(projectPath: string): Promise<DeploymentResult> {
        const install = await this.runner.run({
            command: this.npmBin,
            args: ['install'],
            cwd: projectPath,
            timeoutMs: TIMEOUTS.INSTALL_MS,
        });
        this.tolerate('npm install', install);

        const bootstrap = await this.runner.run({
            command: this.cdkBin,
            args: ['bootstrap'],
            cwd: projectPath,
            timeoutMs: TIMEOUTS.BOOTSTRAP_MS,
        });
        this.tolerate('cdk bootstrap', bootstrap);

        log.info('Deploying stack', { project_path: projectPath });
        const deploy = await this.runner.run({
            command: this.cdkBin,
            args: ['deploy', '--require-approval', 'never'],
            cwd: projectPath,
            timeoutMs: TIMEOUTS.DEPLOY_MS,
        });
        if (deploy.exitCode !== 0) {
            throw new DeployError(deploy.exitCode, deploy.stderr);
        }

        log.info('Deploy succeeded', { project_path: projectPath });
        return { status: 'deployed', output: deploy.stdout, projectPath };
    }

    private tolerate(step: string, res: CommandResult): void {
        if (res.exitCode === 0) return;
        log.warn(`${step} failed, continuing`, {
            exit_code: res.exitCode,
            timed_out: res.timedOut,
            stderr: res.stderr.slice(0, 500),
        });
    }
}
