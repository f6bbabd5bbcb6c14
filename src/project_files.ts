// src/project_files.ts

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { stackClassName } from './code_generator';
import { createLogger } from './logger';

const log = createLogger('project-files');

const FILE_MODE = 0o644;

function errnoCode(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
        return e.code;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

// fsync is best effort: only a full or failing disk aborts the write.
function syncPath(target: string, flags: string, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || 'UNKNOWN'}) on ${target}`);
    }
}

/**
 * Write via a temp file in the same directory, fsync, then rename over the
 * target. Readers see either the old content or the new, never a mix.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: string;
    warnings: string[];
}): void {
    const { filePath, content, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncPath(tmp, 'r+', warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, FILE_MODE);

        syncPath(dir, 'r', warnings);
    } catch (e) {
        try {
            if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        } catch (cleanupErr) {
            log.warn('Temp file cleanup failed', { tmp, error: String(cleanupErr) });
        }
        throw e;
    }
}

/* -------------------------------------------------------------------------- */
/* CDK project layout                                                         */
/* -------------------------------------------------------------------------- */

export function stackFilePath(projectPath: string, projectName: string): string {
    return path.join(projectPath, 'lib', `${projectName}-stack.ts`);
}

export function entryPointFilePath(projectPath: string, projectName: string): string {
    return path.join(projectPath, 'bin', `${projectName}.ts`);
}

/** Entry point that always instantiates the freshly generated stack class. */
export function renderEntryPoint(className: string, projectName: string): string {
    return `#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { ${className} } from '../lib/${projectName}-stack';

const app = new cdk.App();
new ${className}(app, '${className}', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
});
`;
}

export interface ProjectFilesWritten {
    stackFile: string;
    entryFile: string;
    warnings: string[];
}

/** Overwrites both files; existing content is never merged. */
export function writeProjectFiles(projectPath: string, projectName: string, code: string): ProjectFilesWritten {
    const warnings: string[] = [];
    const stackFile = stackFilePath(projectPath, projectName);
    const entryFile = entryPointFilePath(projectPath, projectName);

    atomicWriteFileSync({ filePath: stackFile, content: code, warnings });
    atomicWriteFileSync({
        filePath: entryFile,
        content: renderEntryPoint(stackClassName(projectName), projectName),
        warnings,
    });

    for (const w of warnings) log.warn(w);
    log.info('Project files written', { stack_file: stackFile, entry_file: entryFile });
    return { stackFile, entryFile, warnings };
}
