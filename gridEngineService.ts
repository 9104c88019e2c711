import { exec } from 'child_process';
import { promisify } from 'util';
import { GridEngineConfig, loadConfig } from './config';
import { NotFoundError, UpstreamError } from './errors';
import { JobList, JobPredicate } from './jobList';
import { Logger, logger as baseLogger } from './logger';
import { parseJobInfo } from './qstatParser';
import { ResourceList } from './resources';
import { CommandResult, JobInfo, Queue } from './types';

const execAsync = promisify(exec);

interface ExecFailure {
    message: string;
    stdout?: unknown;
    stderr?: unknown;
    code?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
    return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Runs qstat (locally or over ssh) and assembles its report into jobs and queues
 */
export class GridEngineService {
    private readonly config: GridEngineConfig;
    private readonly logger: Logger;

    constructor(overrides: Partial<GridEngineConfig> = {}, logger: Logger = baseLogger) {
        this.config = loadConfig(process.env, overrides);
        this.logger = logger.child({ component: 'GridEngineService' });
    }

    public getConfig(): GridEngineConfig { return this.config; }

    private async executeCommand(command: string): Promise<CommandResult> {
        const fullCommand = this.buildCommand(command);
        this.logger.debug(`Executing: ${fullCommand}`);
        try {
            const { stdout, stderr } = await execAsync(fullCommand, { maxBuffer: this.config.maxBuffer, timeout: this.config.commandTimeout });
            return { success: true, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 };
        } catch (error) {
            if (!isExecFailure(error)) throw error;
            this.logger.error(`Command failed: ${error.message}`);
            return {
                success: false,
                stdout: typeof error.stdout === 'string' ? error.stdout.trim() : '',
                stderr: typeof error.stderr === 'string' && error.stderr.trim() ? error.stderr.trim() : error.message,
                exitCode: typeof error.code === 'number' ? error.code : 1,
            };
        }
    }

    private buildCommand(command: string): string {
        if (!this.config.sshHost) return command;
        const args = ['ssh'];
        if (this.config.sshKeyPath) args.push('-i', this.config.sshKeyPath);
        args.push('-o', 'BatchMode=yes', '-o', 'StrictHostKeyChecking=accept-new', '-o', 'ConnectTimeout=10');
        args.push(this.config.sshUser ? `${this.config.sshUser}@${this.config.sshHost}` : this.config.sshHost);
        args.push(`'${command.replace(/'/g, "'\\''")}'`);
        return args.join(' ');
    }

    public async getJobInfo(): Promise<JobInfo> {
        const command = this.config.qstatCommand;
        const result = await this.executeCommand(command);
        if (!result.success) {
            throw new UpstreamError(`Failed to get job info: ${result.stderr}`, command, result.exitCode, result.stderr);
        }
        return parseJobInfo(result.stdout);
    }

    /**
     * Every job of every queue, in queue order, followed by the pending jobs
     */
    public async getJobs(): Promise<JobList> {
        const info = await this.getJobInfo();
        const jobs = new JobList([
            ...info.queueInfo.queues.flatMap(q => q.jobList),
            ...info.pendingJobs.jobList,
        ]);
        this.logger.debug(`Assembled ${jobs.length} jobs from ${info.queueInfo.queues.length} queues`);
        return this.config.expandTaskRanges ? jobs.expandTaskRanges() : jobs;
    }

    public async getJobsWithFilter(predicate: JobPredicate): Promise<JobList> {
        return (await this.getJobs()).filter(predicate);
    }

    public async getQueues(): Promise<Queue[]> {
        return (await this.getJobInfo()).queueInfo.queues;
    }

    public async getQueueResources(queueName: string): Promise<ResourceList> {
        const queue = (await this.getQueues()).find(q => q.name === queueName);
        if (!queue) throw new NotFoundError(queueName, 'queue');
        return queue.resources;
    }

    public async testConnection(): Promise<boolean> {
        return (await this.executeCommand('qstat -help')).success;
    }
}
