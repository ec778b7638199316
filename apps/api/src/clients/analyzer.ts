import { type ChildProcess, spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { type Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { AnalysisResult } from '../core/types.js';
import { trackAnalyzerInvocation } from '../lib/metrics.js';
import { truncateText } from '../lib/text-utils.js';
import type { AnalyzerCatalog, AnalyzerProgram } from './analyzer-catalog.js';
import { parseAnalyzerOutput } from './analyzer-output.js';

export interface AnalyzerInvocation {
  kind: string;
  text: string;
  model?: string;
}

export interface AnalyzerInvoker {
  invoke(invocation: AnalyzerInvocation): ResultAsync<AnalysisResult, ApiError>;
  acceptsModel(kind: string): boolean;
  knows(kind: string): boolean;
  kinds(): string[];
}

export const unknownAnalyzerKind = (kind: string, known: string[]): ApiError =>
  createError(ErrorCode.UnknownAnalyzerKind, `Unknown analyzer type: ${kind}`, { known });

export interface ProcessAnalyzerOptions {
  catalog: AnalyzerCatalog;
  workdir: string;
  timeoutMs: number;
  maxInputLength: number;
  logger?: FastifyBaseLogger;
}

/**
 * Runs one external analyzer process per call: the text goes to stdin, a single
 * JSON object is read back from stdout once the process exits.
 */
export class ProcessAnalyzerInvoker implements AnalyzerInvoker {
  constructor(private readonly options: ProcessAnalyzerOptions) {}

  invoke({ kind, text, model }: AnalyzerInvocation): ResultAsync<AnalysisResult, ApiError> {
    const program = this.lookup(kind);
    if (!program) {
      return errAsync(unknownAnalyzerKind(kind, this.kinds()));
    }

    const args = [...program.args];
    if (program.acceptsModel && model) {
      args.push('--model', model);
    }

    const input = truncateText(text, this.options.maxInputLength);
    const startTime = Date.now();

    return this.checkArtifact(program)
      .andThen(() => this.run(program.command, args, input))
      .andThen(parseAnalyzerOutput)
      .map((result) => {
        trackAnalyzerInvocation(kind, 'success', Date.now() - startTime);
        return result;
      })
      .mapErr((error) => {
        trackAnalyzerInvocation(kind, error.code, Date.now() - startTime);
        this.options.logger?.warn({ kind, code: error.code, err: error.message }, 'Analyzer failed');
        return error;
      });
  }

  acceptsModel(kind: string): boolean {
    return this.lookup(kind)?.acceptsModel ?? false;
  }

  knows(kind: string): boolean {
    return this.lookup(kind) !== undefined;
  }

  kinds(): string[] {
    return Object.keys(this.options.catalog);
  }

  private lookup(kind: string): AnalyzerProgram | undefined {
    return Object.hasOwn(this.options.catalog, kind) ? this.options.catalog[kind] : undefined;
  }

  private checkArtifact(program: AnalyzerProgram): ResultAsync<void, ApiError> {
    if (!program.artifact) {
      return okAsync(undefined);
    }

    const artifactPath = resolve(this.options.workdir, program.artifact);
    return ResultAsync.fromPromise(access(artifactPath, constants.R_OK), () =>
      createError(ErrorCode.ProgramNotFound, `Analyzer program not found: ${artifactPath}`)
    );
  }

  private run(command: string, args: string[], input: string): ResultAsync<string, ApiError> {
    const { timeoutMs, workdir, logger } = this.options;

    return new ResultAsync(
      new Promise<Result<string, ApiError>>((settle) => {
        // Own process group, so a timeout also takes down anything a wrapper script started
        const child = spawn(command, args, { cwd: workdir, detached: true });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;

        const finish = (result: Result<string, ApiError>) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          settle(result);
        };

        const timer = setTimeout(() => {
          timedOut = true;
          killProcessGroup(child, logger);
          // Pipes may stay open in orphaned descendants, so do not wait for close
          finish(
            err(
              createError(ErrorCode.AnalyzerTimeout, `Analyzer timed out after ${timeoutMs} ms`, {
                timeoutMs,
              })
            )
          );
        }, timeoutMs);

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        // EPIPE when the program exits without reading its input; the exit code reports the failure
        child.stdin.on('error', (error) => {
          logger?.debug({ command, err: error.message }, 'Analyzer stdin closed early');
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
          finish(
            err(
              error.code === 'ENOENT'
                ? createError(ErrorCode.ProgramNotFound, `Analyzer program not found: ${command}`)
                : createError(
                    ErrorCode.AnalyzerExecutionError,
                    `Failed to start analyzer: ${error.message}`
                  )
            )
          );
        });

        child.on('close', (code, signal) => {
          if (timedOut) return;

          const diagnostics = Buffer.concat(stderr).toString('utf8').trim();
          if (code !== 0) {
            finish(
              err(
                createError(
                  ErrorCode.AnalyzerExecutionError,
                  `Analyzer exited with ${code ?? signal}: ${diagnostics || 'no diagnostic output'}`,
                  { exitCode: code, signal, stderr: diagnostics }
                )
              )
            );
            return;
          }

          finish(ok(Buffer.concat(stdout).toString('utf8')));
        });

        child.stdin.end(input, 'utf8');
      })
    );
  }
}

function killProcessGroup(child: ChildProcess, logger?: FastifyBaseLogger): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    logger?.debug({ pid: child.pid, err: String(error) }, 'Process group kill failed, killing child');
    child.kill('SIGKILL');
  }
}
