import type { z } from 'zod';
import { debug } from '../debug.js';
import type { ClusterSnapshot, PdbRecord, PodRecord, PriorityClassRecord } from '../domain/types.js';
import { MissingDependencyError, ReportError, UpstreamQueryError, errorMessage } from '../errors.js';
import type { CommandOutput, CommandRunner } from './runner.js';
import { PdbListSchema, PodListSchema, PriorityClassListSchema } from './schemas.js';

export interface KubectlClientOptions {
  binary: string;
  context?: string;
  runner: CommandRunner;
}

const firstLine = (text: string): string => text.trim().split('\n')[0] ?? '';

/** Read-only access to the cluster through the kubectl binary. */
export class KubectlClient {
  private readonly binary: string;
  private readonly context?: string;
  private readonly runner: CommandRunner;

  constructor(options: KubectlClientOptions) {
    this.binary = options.binary;
    this.context = options.context;
    this.runner = options.runner;
    debug('KubectlClient initialized', { binary: this.binary, context: this.context ?? null });
  }

  async ensureAvailable(): Promise<void> {
    debug('ensureAvailable start', { binary: this.binary });
    const output = await this.runner(this.binary, ['version', '--client']);
    if (output.exitCode !== 0) {
      debug('ensureAvailable failed', { exitCode: output.exitCode, stderr: output.stderr });
      throw new MissingDependencyError(
        `${this.binary} command is not usable (exit status ${output.exitCode}): ${firstLine(output.stderr)}`,
      );
    }
    debug('ensureAvailable end');
  }

  private async getList(resource: string, scopeArgs: string[]): Promise<unknown> {
    const contextArgs = this.context ? ['--context', this.context] : [];
    const args = [...contextArgs, 'get', resource, ...scopeArgs, '-o', 'json'];
    debug('getList start', { resource, args });

    let output: CommandOutput;
    try {
      output = await this.runner(this.binary, args);
    } catch (error) {
      if (error instanceof ReportError) throw error;
      throw new UpstreamQueryError(resource, `Failed to list ${resource}: ${errorMessage(error)}`, 1, { cause: error });
    }

    if (output.exitCode !== 0) {
      debug('getList failed', { resource, exitCode: output.exitCode, stderrPreview: output.stderr.slice(0, 500) });
      const detail = output.stderr.trim();
      throw new UpstreamQueryError(
        resource,
        `Failed to list ${resource} (kubectl exit status ${output.exitCode})${detail ? `: ${detail}` : ''}`,
        output.exitCode,
      );
    }

    try {
      const payload: unknown = JSON.parse(output.stdout);
      debug('getList end', { resource, bytes: output.stdout.length });
      return payload;
    } catch (error) {
      throw new UpstreamQueryError(resource, `Failed to list ${resource}: kubectl output is not valid JSON`, 1, {
        cause: error,
      });
    }
  }

  private decode<S extends z.ZodTypeAny>(resource: string, schema: S, payload: unknown): z.output<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
      debug('decode failed', { resource, issues: result.error.issues.slice(0, 5) });
      throw new UpstreamQueryError(resource, `Unexpected ${resource} payload from kubectl (${where})`, 1, {
        cause: result.error,
      });
    }
    return result.data;
  }

  async listPods(): Promise<PodRecord[]> {
    const pods = this.decode('pods', PodListSchema, await this.getList('pods', ['-A']));
    debug('listPods end', { pods: pods.length });
    return pods;
  }

  async listPodDisruptionBudgets(): Promise<PdbRecord[]> {
    const pdbs = this.decode('pdb', PdbListSchema, await this.getList('pdb', ['-A']));
    debug('listPodDisruptionBudgets end', { pdbs: pdbs.length });
    return pdbs;
  }

  // PriorityClasses are cluster-scoped, so no -A.
  async listPriorityClasses(): Promise<PriorityClassRecord[]> {
    const priorityClasses = this.decode('priorityclass', PriorityClassListSchema, await this.getList('priorityclass', []));
    debug('listPriorityClasses end', { priorityClasses: priorityClasses.length });
    return priorityClasses;
  }

  async fetchSnapshot(): Promise<ClusterSnapshot> {
    debug('fetchSnapshot start');
    const [pods, pdbs, priorityClasses] = await Promise.all([
      this.listPods(),
      this.listPodDisruptionBudgets(),
      this.listPriorityClasses(),
    ]);
    debug('fetchSnapshot end', { pods: pods.length, pdbs: pdbs.length, priorityClasses: priorityClasses.length });
    return { pods, pdbs, priorityClasses };
  }
}
